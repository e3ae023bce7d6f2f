import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import chalk from 'chalk';
import { TaskStore, createTask, NO_REMINDER, reminderAt } from '@study-planner/core';
import { createStoreContext } from '../src/context.js';
import { createProgram } from '../src/program.js';

let store: TaskStore;
let now: Date;
let lines: string[];

const readCh3 = () => createTask({
  title: 'Read Ch.3',
  dueDate: new Date(2024, 4, 1),
  reminderTime: { hour: 9, minute: 0 },
}, undefined, '1');

/** Run the CLI with the given arguments against the in-memory store */
async function run(...args: string[]): Promise<void> {
  const program = createProgram(createStoreContext(store, () => now));
  await program.parseAsync(args, { from: 'user' });
}

beforeAll(() => {
  chalk.level = 0;
});

beforeEach(() => {
  store = new TaskStore();
  now = new Date(2024, 4, 1, 9, 3); // Wednesday May 1 2024, 09:03
  lines = [];
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    lines.push(args.map(String).join(' '));
  });
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

describe('add', () => {
  it('adds a task with a due date and reminder', async () => {
    await run('add', 'Read Ch.3', '--due', '2024-05-01', '-r', '9:00', '-d', 'Pages 40-60');

    const [task] = store.list();
    expect(task).toBeDefined();
    expect(task?.title).toBe('Read Ch.3');
    expect(task?.description).toBe('Pages 40-60');
    expect(task?.dueDate).toEqual(new Date(2024, 4, 1));
    expect(task?.reminder).toEqual(reminderAt({ hour: 9, minute: 0 }));
    expect(lines).toEqual([`Task ${task?.id} saved for 2024-05-01`]);
  });

  it('defaults the due date to today', async () => {
    await run('add', 'Essay');
    expect(store.list()[0]?.dueDate).toEqual(new Date(2024, 4, 1));
    expect(store.list()[0]?.reminder).toEqual(NO_REMINDER);
  });

  it('rejects an empty title without changing the store', async () => {
    await run('add', '   ');
    expect(store.list()).toEqual([]);
    expect(lines).toEqual(['Title is required']);
    expect(process.exitCode).toBe(1);
  });

  it('reports an unreadable date', async () => {
    await run('add', 'Essay', '--due', 'someday');
    expect(store.list()).toEqual([]);
    expect(lines).toEqual(['Could not parse date: someday']);
  });

  it('warns when adding a reminder while reminders are off', async () => {
    store.setRemindersEnabled(false);
    await run('add', 'Essay', '-r', '18:30');
    expect(lines[1]).toBe('Reminders are turned off. Use "reminders on" to enable them');
  });
});

describe('today / on / list', () => {
  beforeEach(() => {
    store.add(readCh3());
    store.add(createTask({ title: 'Essay', dueDate: new Date(2024, 4, 2) }, undefined, '2'));
  });

  it('shows only tasks due today', async () => {
    await run('today');
    expect(lines).toEqual([
      'Today, Wednesday, May 1',
      '1  Read Ch.3  Due: Today  Remind: 09:00',
    ]);
  });

  it('runs today when no command is given', async () => {
    await run();
    expect(lines[0]).toBe('Today, Wednesday, May 1');
  });

  it('reports a mistyped command instead of running today', async () => {
    await run('tody');
    expect(lines).toEqual(['Unknown command: tody (see --help)']);
    expect(process.exitCode).toBe(1);
  });

  it('shows tasks on a given date', async () => {
    await run('on', '2024-05-02');
    expect(lines).toEqual(['Thursday, May 2', '2  Essay  Due: Tomorrow']);
  });

  it('says when a date has no tasks', async () => {
    await run('on', '2024-05-09');
    expect(lines).toEqual(['Thursday, May 9', 'No tasks due on this day']);
  });

  it('lists everything in insertion order', async () => {
    await run('list');
    expect(lines).toEqual([
      '1  Read Ch.3  Due: Today  Remind: 09:00',
      '2  Essay  Due: Tomorrow',
    ]);
  });
});

describe('edit', () => {
  beforeEach(() => {
    store.add(readCh3());
  });

  it('changes the title and due date', async () => {
    await run('edit', '1', '--title', 'Read Ch.4', '--due', 'tomorrow');
    expect(store.get('1')?.title).toBe('Read Ch.4');
    expect(store.get('1')?.dueDate).toEqual(new Date(2024, 4, 2));
    expect(lines).toEqual(['Task 1 updated']);
  });

  it('removes the reminder with --no-remind', async () => {
    await run('edit', '1', '--no-remind');
    expect(store.get('1')?.reminder).toEqual(NO_REMINDER);
  });

  it('sets a new reminder time', async () => {
    await run('edit', '1', '-r', '7:45');
    expect(store.get('1')?.reminder).toEqual(reminderAt({ hour: 7, minute: 45 }));
  });

  it('does nothing without options', async () => {
    await run('edit', '1');
    expect(lines).toEqual(['Nothing to change']);
    expect(store.get('1')).toEqual(readCh3());
  });

  it('reports an unknown id', async () => {
    await run('edit', 'zzz', '--title', 'x');
    expect(lines).toEqual(['Could not find task with id zzz']);
    expect(process.exitCode).toBe(1);
  });
});

describe('delete', () => {
  it('deletes and is a no-op the second time', async () => {
    store.add(readCh3());
    await run('delete', '1');
    await run('delete', '1');
    expect(store.list()).toEqual([]);
    expect(lines).toEqual(['Deleted task 1', 'No task with id 1']);
    expect(process.exitCode).toBeUndefined();
  });
});

describe('calendar', () => {
  it('highlights the month and lists the selected day', async () => {
    store.add(readCh3());
    await run('calendar', '2024-05');
    expect(lines).toEqual([
      'May 2024',
      'Mo Tu We Th Fr Sa Su',
      '       1  2  3  4  5',
      ' 6  7  8  9 10 11 12',
      '13 14 15 16 17 18 19',
      '20 21 22 23 24 25 26',
      '27 28 29 30 31',
      '',
      'Tasks for Wednesday, May 1',
      '1  Read Ch.3  Due: Today  Remind: 09:00',
    ]);
  });

  it('omits the task list when the selected day is in another month', async () => {
    await run('calendar', '2024-06');
    expect(lines[0]).toBe('June 2024');
    expect(lines).not.toContain('');
  });

  it('follows --select to its month', async () => {
    await run('calendar', '--select', '2024-06-03');
    expect(lines[0]).toBe('June 2024');
    expect(lines[lines.length - 1]).toBe('No tasks for this day');
  });
});

describe('reminders', () => {
  beforeEach(() => {
    store.add(readCh3());
  });

  it('shows and sets the global flag', async () => {
    await run('reminders');
    await run('reminders', 'off');
    await run('reminders');
    expect(store.getRemindersEnabled()).toBe(false);
    expect(lines).toEqual(['Reminders are on', 'Reminders turned off', 'Reminders are off']);
  });

  it('rejects an unknown state', async () => {
    await run('reminders', 'sometimes');
    expect(lines).toEqual(['Expected "on" or "off", got sometimes']);
    expect(store.getRemindersEnabled()).toBe(true);
  });

  it('prints reminders due inside the window', async () => {
    await run('remind');
    now = new Date(2024, 4, 1, 9, 6);
    await run('remind');
    expect(lines).toEqual(['Reminder: Remember: Read Ch.3', 'No reminders due']);
  });

  it('watches until stopped, printing reminders as they come due', async () => {
    let stop = (): void => {};
    const stopped = new Promise<void>((resolve) => { stop = resolve; });
    const program = createProgram(createStoreContext(store, () => now, () => stopped));

    const watching = program.parseAsync(['watch', '-i', '30'], { from: 'user' });
    stop();
    await watching;

    expect(lines).toEqual([
      'Watching for reminders every 30s. Press Ctrl+C to stop.',
      'Reminder: Remember: Read Ch.3',
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  it('rejects a non-positive watch interval', async () => {
    await run('watch', '-i', '0');
    expect(lines).toEqual(['Interval must be a positive number of seconds, got 0']);
    expect(process.exitCode).toBe(1);
  });

  it('prints nothing due while reminders are off', async () => {
    store.setRemindersEnabled(false);
    await run('remind');
    expect(lines).toEqual(['Reminders are turned off. Use "reminders on" to enable them']);
  });
});

describe('export / import', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'planner-cli-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the persisted form and reads it back', async () => {
    store.add(readCh3());
    const file = join(dir, 'tasks.json');
    await run('export', '-o', file);

    expect(JSON.parse(readFileSync(file, 'utf8'))).toEqual([{
      id: '1',
      title: 'Read Ch.3',
      description: null,
      dueDate: '2024-05-01T00:00:00.000',
      reminderTime: '9:0',
      reminderEnabled: true,
    }]);

    store = new TaskStore();
    await run('import', file);
    expect(store.list()).toEqual([readCh3()]);
    expect(lines).toEqual([`Exported 1 task(s) to ${file}`, 'Imported 1 of 1 task(s)']);
  });

  it('skips tasks whose id is already taken', async () => {
    store.add(readCh3());
    const file = join(dir, 'tasks.json');
    writeFileSync(file, JSON.stringify([
      { id: '1', title: 'Duplicate', dueDate: '2024-05-01' },
      { id: '2', title: 'Essay', dueDate: '2024-05-02' },
    ]));

    await run('import', file);
    expect(store.list().map(t => t.id)).toEqual(['1', '2']);
    expect(lines).toEqual(['Skipped 1: A task with id 1 already exists', 'Imported 1 of 2 task(s)']);
  });
});
