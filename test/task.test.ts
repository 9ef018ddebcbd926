import test from 'node:test';
import assert from 'node:assert/strict';

import { TaskValidationError } from '../src/errors.js';
import {
  applyTaskPatch,
  createTask,
  formatReminderTime,
  formatTaskLine,
  fromTaskRecord,
  matchesQuery,
  nextTaskId,
  toTaskRecord,
  toggleCompleted
} from '../src/todo/task.js';
import type { Task } from '../src/todo/types.js';

const NOW = new Date('2026-03-01T08:00:00.000Z');

function task(partial: Partial<Task> & { id: string }): Task {
  return {
    title: 'Task',
    category: 'General',
    completed: false,
    remindAt: null,
    createdAt: NOW.toISOString(),
    completedAt: null,
    ...partial
  };
}

test('nextTaskId continues after the highest numbered id', () => {
  assert.equal(nextTaskId([]), 'TASK-0001');
  assert.equal(
    nextTaskId([task({ id: 'TASK-0002' }), task({ id: 'TASK-0010' }), task({ id: 'legacy-7' })]),
    'TASK-0011'
  );
});

test('createTask trims the title and fills defaults', () => {
  const t = createTask(
    { title: '  Buy milk  ', remindAt: '2026-03-01T10:00:00Z' },
    { id: 'TASK-0001', now: NOW }
  );
  assert.deepEqual(t, {
    id: 'TASK-0001',
    title: 'Buy milk',
    category: 'General',
    completed: false,
    remindAt: '2026-03-01T10:00:00.000Z',
    createdAt: '2026-03-01T08:00:00.000Z',
    completedAt: null
  });
});

test('createTask rejects blank titles and bad reminder times', () => {
  assert.throws(() => createTask({ title: '   ' }, { id: 'TASK-0001' }), TaskValidationError);
  assert.throws(() => createTask({ title: 'x', remindAt: 'soon' }, { id: 'TASK-0001' }), TaskValidationError);
  assert.throws(() => createTask({ title: 'x', category: ' ' }, { id: 'TASK-0001' }), TaskValidationError);
});

test('applyTaskPatch only stamps completion on a real state change', () => {
  const open = task({ id: 'TASK-0001' });

  const done = applyTaskPatch(open, { completed: true }, '2026-03-02T00:00:00.000Z');
  assert.equal(done.completed, true);
  assert.equal(done.completedAt, '2026-03-02T00:00:00.000Z');

  const again = applyTaskPatch(done, { completed: true }, '2026-03-03T00:00:00.000Z');
  assert.equal(again.completedAt, '2026-03-02T00:00:00.000Z');

  const reopened = applyTaskPatch(again, { completed: false, title: ' Renamed ' });
  assert.equal(reopened.completed, false);
  assert.equal(reopened.completedAt, null);
  assert.equal(reopened.title, 'Renamed');

  // input is not mutated
  assert.equal(open.completed, false);
});

test('toggleCompleted flips state both ways', () => {
  const t = task({ id: 'TASK-0001' });
  const on = toggleCompleted(t, '2026-03-02T00:00:00.000Z');
  assert.deepEqual([on.completed, on.completedAt], [true, '2026-03-02T00:00:00.000Z']);
  const off = toggleCompleted(on);
  assert.deepEqual([off.completed, off.completedAt], [false, null]);
});

test('toTaskRecord writes snake_case keys', () => {
  const t = task({ id: 'TASK-0003', title: 'Read', category: 'Study', remindAt: '2026-03-04T09:00:00.000Z' });
  assert.deepEqual(toTaskRecord(t), {
    id: 'TASK-0003',
    title: 'Read',
    category: 'Study',
    completed: false,
    remind_at: '2026-03-04T09:00:00.000Z',
    created_at: '2026-03-01T08:00:00.000Z',
    completed_at: null
  });
  assert.deepEqual(fromTaskRecord(toTaskRecord(t)), t);
});

test('fromTaskRecord fills keys missing from older files', () => {
  const t = fromTaskRecord({ id: '1', title: 'Old entry' }, { now: NOW });
  assert.deepEqual(t, {
    id: '1',
    title: 'Old entry',
    category: 'General',
    completed: false,
    remindAt: null,
    createdAt: '2026-03-01T08:00:00.000Z',
    completedAt: null
  });
});

test('fromTaskRecord drops completed_at on pending tasks', () => {
  const t = fromTaskRecord({
    id: 'TASK-0001',
    title: 'x',
    completed: false,
    created_at: '2026-03-01T08:00:00Z',
    completed_at: '2026-03-01T09:00:00Z'
  });
  assert.equal(t.completedAt, null);
});

test('fromTaskRecord rejects malformed values', () => {
  assert.throws(() => fromTaskRecord('TASK-0001'), TaskValidationError);
  assert.throws(() => fromTaskRecord({ id: '', title: 'x' }), TaskValidationError);
  assert.throws(() => fromTaskRecord({ id: 'a', title: 'x', completed: 'yes' }), TaskValidationError);
  assert.throws(() => fromTaskRecord({ id: 'a', title: 'x', remind_at: 'tomorrow' }), TaskValidationError);
});

test('formatTaskLine shows status, category and reminder', () => {
  const pending = task({ id: 'TASK-0001', title: 'Call mom', category: 'Life', remindAt: '2026-03-05T14:30:00.000Z' });
  assert.equal(formatTaskLine(pending, { timeZone: 'UTC' }), '○ Call mom [Life] ⏰03/05 14:30');

  const done = task({ id: 'TASK-0002', title: 'Pay rent', completed: true });
  assert.equal(formatTaskLine(done, { timeZone: 'UTC' }), '✓ Pay rent [General]');
});

test('formatReminderTime uses the requested zone', () => {
  assert.equal(formatReminderTime('2026-03-05T23:15:00.000Z', 'UTC'), '03/05 23:15');
  assert.equal(formatReminderTime('2026-03-05T23:15:00.000Z', 'Asia/Tokyo'), '03/06 08:15');
});

test('matchesQuery looks at title and category, case-insensitively', () => {
  const t = task({ id: 'TASK-0001', title: 'Quarterly report', category: 'Work' });
  assert.equal(matchesQuery(t, 'REPORT'), true);
  assert.equal(matchesQuery(t, 'work'), true);
  assert.equal(matchesQuery(t, 'gym'), false);
  assert.equal(matchesQuery(t, '  '), true);
});
