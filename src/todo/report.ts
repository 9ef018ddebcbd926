import type { Reminder } from './reminder.js';
import { formatReminderTime } from './task.js';
import type { Task } from './types.js';

export interface CategoryStats {
  category: string;
  total: number;
  completed: number;
  rate: number; // 0..100, one decimal
}

export interface TaskStatistics {
  total: number;
  completed: number;
  pending: number;
  completionRate: number; // 0..100, one decimal
  categories: CategoryStats[];
  upcoming: Reminder[];
}

export const UPCOMING_LIMIT = 5;

function percent(part: number, whole: number): number {
  if (!whole) return 0;
  return Math.round((part / whole) * 1000) / 10;
}

export function buildTaskStatistics(tasks: readonly Task[], upcoming: readonly Reminder[] = []): TaskStatistics {
  const completed = tasks.filter((t) => t.completed).length;

  // Map keeps first-seen order.
  const byCategory = new Map<string, { total: number; completed: number }>();
  for (const t of tasks) {
    const entry = byCategory.get(t.category) ?? { total: 0, completed: 0 };
    entry.total++;
    if (t.completed) entry.completed++;
    byCategory.set(t.category, entry);
  }

  return {
    total: tasks.length,
    completed,
    pending: tasks.length - completed,
    completionRate: percent(completed, tasks.length),
    categories: [...byCategory].map(([category, s]) => ({
      category,
      total: s.total,
      completed: s.completed,
      rate: percent(s.completed, s.total)
    })),
    upcoming: upcoming.slice(0, UPCOMING_LIMIT)
  };
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

export function formatStatisticsText(stats: TaskStatistics, opts?: { timeZone?: string }): string {
  const lines: string[] = [];
  lines.push('Overall:');
  lines.push(`  Total: ${stats.total}`);
  lines.push(`  Completed: ${stats.completed}`);
  lines.push(`  Pending: ${stats.pending}`);
  lines.push(`  Completion rate: ${stats.completionRate.toFixed(1)}%`);

  lines.push('');
  lines.push('By category:');
  if (!stats.categories.length) lines.push('  (no tasks)');
  for (const c of stats.categories) {
    lines.push(`  ${c.category}: ${c.completed}/${c.total} (${c.rate.toFixed(1)}%)`);
  }

  lines.push('');
  lines.push('Upcoming reminders:');
  if (!stats.upcoming.length) lines.push('  (none)');
  for (const r of stats.upcoming) {
    lines.push(`  ${formatReminderTime(r.remindAt, opts?.timeZone)} - ${truncate(r.taskTitle, 20)}`);
  }

  return lines.join('\n');
}
