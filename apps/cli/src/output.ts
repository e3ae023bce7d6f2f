/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import type { Task, Week } from '@study-planner/core';
import { formatClock, reminderTime, startOfDay, WEEKDAY_LABELS } from '@study-planner/core';

const DAY_MS = 86_400_000;

// --- Formatting functions ---

function formatMonthDay(d: Date): string {
  return d.toLocaleDateString('en-US', { month: 'short', day: 'numeric' });
}

/** "Wednesday, May 1" */
export function formatLongDate(d: Date): string {
  return d.toLocaleDateString('en-US', { weekday: 'long', month: 'long', day: 'numeric' });
}

/** "May 2024" */
export function formatMonthLabel(year: number, month: number): string {
  return new Date(year, month - 1, 1).toLocaleDateString('en-US', { month: 'long', year: 'numeric' });
}

export function formatDueDate(dueDate: Date, now: Date): string {
  const diff = Math.round((startOfDay(dueDate).getTime() - startOfDay(now).getTime()) / DAY_MS);

  if (diff < 0) return chalk.red(`  OVERDUE (${-diff}d)`);
  if (diff === 0) return chalk.yellow('  Due: Today');
  if (diff === 1) return chalk.dim('  Due: Tomorrow');
  if (diff < 7) return chalk.dim(`  Due: ${dueDate.toLocaleDateString('en-US', { weekday: 'long' })}`);
  return chalk.dim(`  Due: ${formatMonthDay(dueDate)}`);
}

export function formatReminder(task: Task): string {
  const time = reminderTime(task);
  return time ? chalk.cyan(`  Remind: ${formatClock(time)}`) : '';
}

/** One line per task, plus an indented line for its description */
export function formatTask(task: Task, now: Date): string {
  const head = `${chalk.dim(task.id)}  ${chalk.bold(task.title)}${formatDueDate(task.dueDate, now)}${formatReminder(task)}`;
  if (!task.description) return head;
  const indent = ' '.repeat(task.id.length + 2);
  return `${head}\n${indent}${chalk.dim(task.description)}`;
}

/**
 * Render a month grid. Days with tasks are highlighted and the selected day
 * is inverted.
 */
export function renderCalendar(
  year: number,
  month: number,
  weeks: readonly Week[],
  taskDays: ReadonlySet<number>,
  selectedDay: number | null,
): string[] {
  const lines = [chalk.bold(formatMonthLabel(year, month)), chalk.dim(WEEKDAY_LABELS.join(' '))];
  for (const week of weeks) {
    const cells = week.map((day) => {
      if (day === null) return '  ';
      const label = String(day).padStart(2, ' ');
      if (day === selectedDay) return chalk.inverse(label);
      if (taskDays.has(day)) return chalk.yellow.bold(label);
      return label;
    });
    lines.push(cells.join(' ').replace(/\s+$/, ''));
  }
  return lines;
}

// --- Task output ---

export function printTasks(tasks: readonly Task[], now: Date, emptyMessage: string): void {
  if (tasks.length === 0) {
    info(chalk.dim(emptyMessage));
    return;
  }
  for (const task of tasks) {
    console.log(formatTask(task, now));
  }
}

export function reminder(task: Task): void {
  console.log(`${chalk.yellow.bold('Reminder:')} Remember: ${task.title}`);
}

// --- Basic output ---

export function heading(message: string): void {
  console.log(chalk.bold.underline(message));
}

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
