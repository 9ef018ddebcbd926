import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import type { Task } from '../src/todo/types.js';

export async function makeTempDir(prefix = 'todo-'): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/** A clock the test can move by hand. */
export function fixedClock(start: Date): { now: () => Date; set: (d: Date) => void } {
  let current = start;
  return {
    now: () => new Date(current.getTime()),
    set: (d: Date) => {
      current = d;
    }
  };
}

export function makeTask(partial: Partial<Task> & { id: string }): Task {
  return {
    title: 'Task',
    category: 'General',
    completed: false,
    remindAt: null,
    createdAt: '2026-03-01T08:00:00.000Z',
    completedAt: null,
    ...partial
  };
}
