import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TaskStore } from '../../src/store/task-store.js';
import { createTask, withChanges } from '../../src/store/task-helpers.js';
import { ReminderScheduler } from '../../src/reminders/reminder-scheduler.js';
import type { Task } from '../../src/types/task.js';

let store: TaskStore;
let delivered: string[];
let onReminder: (task: Task) => void;

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(new Date(2024, 4, 1, 8, 58));
  store = new TaskStore();
  store.add(createTask({ title: 'Read Ch.3', dueDate: new Date(2024, 4, 1), reminderTime: { hour: 9, minute: 0 } }, undefined, '1'));
  delivered = [];
  onReminder = (task) => { delivered.push(task.id); };
});

afterEach(() => {
  vi.useRealTimers();
});

describe('ReminderScheduler', () => {
  it('delivers a reminder once when polling reaches its window', () => {
    const scheduler = new ReminderScheduler(store, { onReminder, intervalMs: 60_000 });
    scheduler.start();
    expect(delivered).toEqual([]);

    vi.advanceTimersByTime(2 * 60_000); // 09:00
    expect(delivered).toEqual(['1']);

    vi.advanceTimersByTime(3 * 60_000); // 09:03, still inside the window
    expect(delivered).toEqual(['1']);

    scheduler.stop();
  });

  it('stops polling after stop()', () => {
    const scheduler = new ReminderScheduler(store, { onReminder, intervalMs: 60_000 });
    scheduler.start();
    expect(scheduler.running).toBe(true);
    scheduler.stop();
    expect(scheduler.running).toBe(false);

    vi.advanceTimersByTime(5 * 60_000);
    expect(delivered).toEqual([]);
  });

  it('delivers nothing while reminders are disabled', () => {
    store.setRemindersEnabled(false);
    const scheduler = new ReminderScheduler(store, { onReminder, now: () => new Date(2024, 4, 1, 9, 1) });
    expect(scheduler.check()).toEqual([]);
    expect(delivered).toEqual([]);
  });

  it('delivers again when the reminder moves to a new time', () => {
    let now = new Date(2024, 4, 1, 9, 1);
    const scheduler = new ReminderScheduler(store, { onReminder, now: () => now });

    expect(scheduler.check().map(t => t.id)).toEqual(['1']);
    expect(scheduler.check()).toEqual([]);

    const task = store.get('1');
    if (!task) throw new Error('task missing');
    store.update(withChanges(task, { reminderTime: { hour: 9, minute: 2 } }));
    now = new Date(2024, 4, 1, 9, 3);

    expect(scheduler.check().map(t => t.id)).toEqual(['1']);
    expect(delivered).toEqual(['1', '1']);
  });

  it('can forget delivered reminders', () => {
    const scheduler = new ReminderScheduler(store, { onReminder, now: () => new Date(2024, 4, 1, 9, 1) });
    scheduler.check();
    scheduler.reset();
    scheduler.check();
    expect(delivered).toEqual(['1', '1']);
  });

  it('logs and keeps polling when a check throws', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    let calls = 0;
    const source = {
      list: (): readonly Task[] => {
        calls++;
        throw new Error('boom');
      },
      getRemindersEnabled: () => true,
    };
    const scheduler = new ReminderScheduler(source, { onReminder, intervalMs: 1_000 });
    scheduler.start();
    vi.advanceTimersByTime(2_000);
    scheduler.stop();

    expect(calls).toBe(3);
    expect(errorSpy).toHaveBeenCalledWith('[REMINDERS]:', 'check error:', 'boom');
    errorSpy.mockRestore();
  });

  it('keeps delivering the others when one callback throws, then retries it', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    store.add(createTask({ title: 'Essay', dueDate: new Date(2024, 4, 1), reminderTime: { hour: 9, minute: 0 } }, undefined, 'b'));
    let failNext = true;
    const scheduler = new ReminderScheduler(store, {
      now: () => new Date(2024, 4, 1, 9, 1),
      onReminder: (task) => {
        if (task.id === '1' && failNext) {
          failNext = false;
          throw new Error('boom');
        }
        delivered.push(task.id);
      },
    });

    expect(scheduler.check().map(t => t.id)).toEqual(['b']);
    expect(errorSpy).toHaveBeenCalledWith('[REMINDERS]:', 'reminder for task 1 failed:', 'boom');

    expect(scheduler.check().map(t => t.id)).toEqual(['1']);
    expect(scheduler.check()).toEqual([]);
    expect(delivered).toEqual(['b', '1']);
    errorSpy.mockRestore();
  });

  it('forgets delivered reminders once their window has closed', () => {
    let now = new Date(2024, 4, 1, 9, 1);
    const scheduler = new ReminderScheduler(store, { onReminder, now: () => now });

    scheduler.check();
    expect(scheduler.notifiedCount).toBe(1);

    now = new Date(2024, 4, 1, 9, 4, 59);
    scheduler.check();
    expect(scheduler.notifiedCount).toBe(1);

    now = new Date(2024, 4, 1, 9, 5);
    expect(scheduler.check()).toEqual([]);
    expect(scheduler.notifiedCount).toBe(0);
    expect(delivered).toEqual(['1']);
  });

  it('rejects a non-positive interval', () => {
    expect(() => new ReminderScheduler(store, { onReminder, intervalMs: 0 })).toThrow(RangeError);
  });
});
