/**
 * What every command needs: the store, a live read view for long-running
 * commands, and the clock. The database opens on first use so that --db is
 * parsed before anything touches disk.
 */

import type { PlannerDb, TaskRepository, TaskSource } from '@study-planner/core';
import {
  TaskStore, SqliteTaskRepository, createDb, closeDb, resolveDbPath, liveSource,
} from '@study-planner/core';

export interface CliContext {
  store(): TaskStore;
  /** Re-reads storage on every call */
  source(): TaskSource;
  now(): Date;
  /** Resolves when a long-running command should stop */
  untilStopped(): Promise<void>;
  close(): void;
}

function untilSignal(): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });
}

export function createSqliteContext(getDbPath: () => string | undefined): CliContext {
  let db: PlannerDb | null = null;
  let repository: TaskRepository | null = null;
  let store: TaskStore | null = null;

  const open = (): TaskRepository => {
    if (!repository) {
      db = createDb(resolveDbPath(getDbPath()));
      repository = new SqliteTaskRepository(db);
    }
    return repository;
  };

  return {
    store: () => {
      store ??= TaskStore.open(open());
      return store;
    },
    source: () => liveSource(open()),
    now: () => new Date(),
    untilStopped: untilSignal,
    close: () => {
      if (db) closeDb(db);
      db = null;
      repository = null;
      store = null;
    },
  };
}

/** Context over an existing store; used by tests and embedders */
export function createStoreContext(
  store: TaskStore,
  now: () => Date = () => new Date(),
  untilStopped: () => Promise<void> = untilSignal,
): CliContext {
  return {
    store: () => store,
    source: () => store,
    now,
    untilStopped,
    close: () => {},
  };
}
