/**
 * Polls the store for due reminders and hands each one to a callback once.
 */

import type { Task } from '../types/task.js';
import type { TaskSource } from '../store/task-store.js';
import { createLogger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { dueReminders, reminderInstant, REMINDER_WINDOW_MS } from './evaluator.js';

const log = createLogger('reminders');

export const DEFAULT_POLL_INTERVAL_MS = 60_000;

export interface ReminderSchedulerOptions {
  onReminder: (task: Task) => void;
  /** Defaults to 60s. Anything above five minutes can miss reminders. */
  intervalMs?: number;
  now?: () => Date;
}

export class ReminderScheduler {
  private readonly store: TaskSource;
  private readonly onReminder: (task: Task) => void;
  private readonly intervalMs: number;
  private readonly now: () => Date;
  private timer: ReturnType<typeof setInterval> | null = null;
  /** `${taskId}@${instantMs}` -> instantMs, for every reminder already delivered */
  private readonly notified = new Map<string, number>();

  constructor(store: TaskSource, opts: ReminderSchedulerOptions) {
    if (opts.intervalMs !== undefined && !(opts.intervalMs > 0)) {
      throw new RangeError(`Poll interval must be positive, got ${opts.intervalMs}`);
    }
    this.store = store;
    this.onReminder = opts.onReminder;
    this.intervalMs = opts.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.now = opts.now ?? (() => new Date());
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** Run a check immediately, then on every interval. Restarts if already running. */
  start(): void {
    this.stop();
    log.debug(`polling started (interval: ${this.intervalMs}ms)`);
    this.tick();
    this.timer = setInterval(() => this.tick(), this.intervalMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    log.debug('polling stopped');
  }

  /**
   * Deliver every due reminder not delivered before. Returns the tasks
   * delivered by this call. Does nothing while reminders are disabled.
   *
   * A reminder counts as delivered only once `onReminder` returns; if it
   * throws, the error is logged and the next check inside the window retries.
   */
  check(): Task[] {
    if (!this.store.getRemindersEnabled()) return [];

    const now = this.now();
    this.prune(now);

    const delivered: Task[] = [];
    for (const task of dueReminders(this.store, now)) {
      const instant = reminderInstant(task);
      if (!instant) continue;
      const key = `${task.id}@${instant.getTime()}`;
      if (this.notified.has(key)) continue;

      try {
        this.onReminder(task);
      } catch (err) {
        log.error(`reminder for task ${task.id} failed:`, errorMessage(err));
        continue;
      }
      this.notified.set(key, instant.getTime());
      delivered.push(task);
    }

    log.debug(`check: ${delivered.length} new reminder(s)`);
    return delivered;
  }

  /** Number of delivered reminders still remembered */
  get notifiedCount(): number {
    return this.notified.size;
  }

  /** Forget delivered reminders so they can fire again */
  reset(): void {
    this.notified.clear();
  }

  /** Drop keys whose window has closed; they can never be due again */
  private prune(now: Date): void {
    const cutoff = now.getTime() - REMINDER_WINDOW_MS;
    for (const [key, instantMs] of this.notified) {
      if (instantMs <= cutoff) this.notified.delete(key);
    }
  }

  private tick(): void {
    try {
      this.check();
    } catch (err) {
      log.error('check error:', errorMessage(err));
    }
  }
}
