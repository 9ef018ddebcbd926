import test from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import { TaskNotFoundError, TaskStorageError, TaskValidationError } from '../src/errors.js';
import { silentLogger } from '../src/logger.js';
import { TaskManager } from '../src/todo/manager.js';
import { TaskStorage } from '../src/todo/storage.js';
import type { Task } from '../src/todo/types.js';
import { fixedClock, makeTempDir } from './helpers.js';

async function mkManager(opts: { categories?: string[] } = {}) {
  const dir = await makeTempDir('todo-manager-');
  const dataFile = path.join(dir, 'data', 'tasks.json');
  const clock = fixedClock(new Date('2026-03-01T08:00:00.000Z'));
  const logger = silentLogger();
  const manager = await TaskManager.open({
    storage: new TaskStorage({ dataFile, logger, now: clock.now }),
    logger,
    categories: opts.categories,
    now: clock.now
  });
  return { manager, dataFile, dir, clock };
}

async function readIds(dataFile: string): Promise<string[]> {
  const data: unknown = JSON.parse(await fs.readFile(dataFile, 'utf8'));
  assert.ok(Array.isArray(data));
  return data.map((r: { id: string }) => r.id);
}

test('open creates the data directory and starts empty', async () => {
  const { manager, dir } = await mkManager();
  assert.deepEqual(manager.getAllTasks(), []);
  assert.ok((await fs.stat(path.join(dir, 'data'))).isDirectory());
  assert.equal(manager.isDirty, false);
});

test('addTask assigns sequential ids and writes through', async () => {
  const { manager, dataFile } = await mkManager();

  const a = await manager.addTask({ title: 'Buy milk' });
  const b = await manager.addTask({ title: 'Write report', category: 'Work' });

  assert.equal(a.id, 'TASK-0001');
  assert.equal(b.id, 'TASK-0002');
  assert.equal(a.category, 'General');
  assert.equal(a.createdAt, '2026-03-01T08:00:00.000Z');
  assert.deepEqual(await readIds(dataFile), ['TASK-0001', 'TASK-0002']);
});

test('a reopened manager sees the same tasks', async () => {
  const { manager, dataFile } = await mkManager();
  await manager.addTask({ title: 'Persist me', category: 'Life' });
  await manager.toggleTask('TASK-0001');

  const logger = silentLogger();
  const reopened = await TaskManager.open({ storage: new TaskStorage({ dataFile, logger }), logger });
  assert.deepEqual(reopened.getAllTasks(), manager.getAllTasks());
});

test('ids are not reused after the newest task is removed', async () => {
  const { manager } = await mkManager();
  await manager.addTask({ title: 'one' });
  await manager.addTask({ title: 'two' });
  await manager.addTask({ title: 'three' });
  await manager.removeTask('TASK-0002');

  const next = await manager.addTask({ title: 'four' });
  assert.equal(next.id, 'TASK-0004');
});

test('toggle, complete and uncomplete maintain completedAt', async () => {
  const { manager, clock } = await mkManager();
  await manager.addTask({ title: 'x' });

  clock.set(new Date('2026-03-01T09:30:00.000Z'));
  const done = await manager.toggleTask('TASK-0001');
  assert.equal(done.completed, true);
  assert.equal(done.completedAt, '2026-03-01T09:30:00.000Z');

  const undone = await manager.uncompleteTask('TASK-0001');
  assert.equal(undone.completedAt, null);

  const again = await manager.completeTask('TASK-0001');
  assert.equal(again.completed, true);
});

test('updateTask edits fields and validates input', async () => {
  const { manager } = await mkManager();
  await manager.addTask({ title: 'Draft' });

  const t = await manager.updateTask('TASK-0001', {
    title: 'Final',
    category: 'Work',
    remindAt: '2026-03-02T10:00:00+02:00'
  });
  assert.equal(t.title, 'Final');
  assert.equal(t.category, 'Work');
  assert.equal(t.remindAt, '2026-03-02T08:00:00.000Z');

  await assert.rejects(manager.updateTask('TASK-0001', { title: '' }), TaskValidationError);
  await assert.rejects(manager.updateTask('TASK-0099', { title: 'x' }), TaskNotFoundError);
  assert.equal(manager.getTaskById('TASK-0001')?.title, 'Final');
});

test('setReminder sets and clears the reminder', async () => {
  const { manager } = await mkManager();
  await manager.addTask({ title: 'Call' });
  const set = await manager.setReminder('TASK-0001', '2026-03-01T12:00:00Z');
  assert.equal(set.remindAt, '2026-03-01T12:00:00.000Z');
  const cleared = await manager.setReminder('TASK-0001', null);
  assert.equal(cleared.remindAt, null);
});

test('removeTasks counts what was actually removed', async () => {
  const { manager, dataFile } = await mkManager();
  await manager.addTask({ title: 'a' });
  await manager.addTask({ title: 'b' });

  assert.equal(await manager.removeTask('TASK-0404'), false);
  assert.equal(await manager.removeTasks(['TASK-0001', 'TASK-0404']), 1);
  assert.deepEqual(await readIds(dataFile), ['TASK-0002']);
});

test('clearCompletedTasks keeps pending tasks in order', async () => {
  const { manager } = await mkManager();
  for (const title of ['a', 'b', 'c', 'd']) await manager.addTask({ title });
  await manager.completeTask('TASK-0001');
  await manager.completeTask('TASK-0003');

  assert.equal(await manager.clearCompletedTasks(), 2);
  assert.deepEqual(
    manager.getAllTasks().map((t) => t.title),
    ['b', 'd']
  );
  assert.equal(await manager.clearCompletedTasks(), 0);
});

test('listTasks filters by category, state and search text', async () => {
  const { manager } = await mkManager();
  await manager.addTask({ title: 'Quarterly report', category: 'Work' });
  await manager.addTask({ title: 'Gym', category: 'Health' });
  await manager.addTask({ title: 'Report bug', category: 'Work' });
  await manager.completeTask('TASK-0003');

  const titles = (tasks: Task[]) => tasks.map((t) => t.title);
  assert.deepEqual(titles(manager.getTasksByCategory('Work')), ['Quarterly report', 'Report bug']);
  assert.deepEqual(titles(manager.getPendingTasks()), ['Quarterly report', 'Gym']);
  assert.deepEqual(titles(manager.getCompletedTasks()), ['Report bug']);
  assert.deepEqual(titles(manager.searchTasks('report')), ['Quarterly report', 'Report bug']);
  assert.deepEqual(titles(manager.searchTasks('health')), ['Gym']);
  assert.deepEqual(titles(manager.listTasks({ category: 'Work', state: 'pending' })), ['Quarterly report']);
});

test('resolveRef accepts ids and 1-based positions', async () => {
  const { manager } = await mkManager();
  await manager.addTask({ title: 'first' });
  await manager.addTask({ title: 'second' });

  assert.equal(manager.resolveRef('2')?.title, 'second');
  assert.equal(manager.resolveRef('TASK-0001')?.title, 'first');
  assert.equal(manager.resolveRef('3'), null);
  assert.equal(manager.resolveRef('0'), null);
  assert.throws(() => manager.requireTask('nope'), TaskNotFoundError);
});

test('listCategories puts configured categories first', async () => {
  const { manager } = await mkManager({ categories: ['Home', 'Work'] });
  await manager.addTask({ title: 'x', category: 'Errands' });
  await manager.addTask({ title: 'y', category: 'Work' });
  assert.deepEqual(manager.listCategories(), ['Home', 'Work', 'Errands']);
});

test('getAllTasks returns a copy', async () => {
  const { manager } = await mkManager();
  await manager.addTask({ title: 'x' });
  manager.getAllTasks().pop();
  assert.equal(manager.getAllTasks().length, 1);
});

test('subscribers see every change; a failing subscriber does not break the mutation', async () => {
  const { manager } = await mkManager();
  const seen: number[] = [];
  const unsubscribe = manager.subscribe((tasks) => seen.push(tasks.length));
  manager.subscribe(() => {
    throw new Error('listener bug');
  });

  await manager.addTask({ title: 'a' });
  await manager.addTask({ title: 'b' });
  unsubscribe();
  await manager.addTask({ title: 'c' });

  assert.deepEqual(seen, [1, 2]);
  assert.equal(manager.getAllTasks().length, 3);
});

test('a failed save keeps the change in memory and flush retries it', async () => {
  const { manager, dataFile, dir } = await mkManager();
  await manager.addTask({ title: 'saved' });

  // Replace the data directory with a regular file so the next write fails.
  const dataDir = path.join(dir, 'data');
  await fs.rm(dataDir, { recursive: true, force: true });
  await fs.writeFile(dataDir, 'blocker', 'utf8');

  await assert.rejects(manager.addTask({ title: 'pending write' }), TaskStorageError);
  assert.equal(manager.isDirty, true);
  assert.deepEqual(
    manager.getAllTasks().map((t) => t.title),
    ['saved', 'pending write']
  );

  await fs.rm(dataDir, { force: true });
  assert.equal(await manager.flush(), true);
  assert.equal(manager.isDirty, false);
  assert.deepEqual(await readIds(dataFile), ['TASK-0001', 'TASK-0002']);
  assert.equal(await manager.flush(), false);
});

test('load reports skipped entries from a damaged file', async () => {
  const { manager, dataFile } = await mkManager();
  await fs.writeFile(dataFile, JSON.stringify([{ id: 'TASK-0001', title: 'ok' }, { id: 'TASK-0002' }]), 'utf8');

  const result = await manager.load();
  assert.equal(result.skipped, 1);
  assert.equal(manager.lastLoad?.skipped, 1);
  assert.deepEqual(
    manager.getAllTasks().map((t) => t.id),
    ['TASK-0001']
  );
});

test('toggling twice restores the original task', async () => {
  const { manager } = await mkManager();
  const original = await manager.addTask({ title: 'x', category: 'Work' });
  await manager.toggleTask('TASK-0001');
  const back = await manager.toggleTask('TASK-0001');
  assert.deepEqual(back, original);
});

test('a deleted data folder is recreated on the next change with every task', async () => {
  const { manager, dataFile, dir } = await mkManager();
  await manager.addTask({ title: 'a' });
  await fs.rm(path.join(dir, 'data'), { recursive: true, force: true });

  await manager.addTask({ title: 'b' });
  assert.deepEqual(await readIds(dataFile), ['TASK-0001', 'TASK-0002']);
});

test('overlapping changes all reach the file', async () => {
  const { manager, dataFile } = await mkManager();

  const added = await Promise.all(Array.from({ length: 10 }, (_, i) => manager.addTask({ title: `task ${i}` })));

  const ids = manager.getAllTasks().map((t) => t.id);
  assert.equal(new Set(added.map((t) => t.id)).size, 10);
  assert.deepEqual(await readIds(dataFile), ids);
  assert.equal(manager.isDirty, false);
  assert.deepEqual(await fs.readdir(path.dirname(dataFile)), ['tasks.json']);
});
