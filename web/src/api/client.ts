import type { QuickReminderOption, Reminder, Task, TaskFilter, TaskStatistics } from './types.js'
import { apiFetch, readJson } from './apiFetch.js'

export type CreateTaskInput = {
  title: string
  category?: string
  remindAt?: string | null
}

export type TaskPatch = {
  title?: string
  category?: string
  completed?: boolean
  remindAt?: string | null
}

function taskUrl(id: string, suffix = ''): string {
  return `/api/tasks/${encodeURIComponent(id)}${suffix}`
}

export function buildTasksQuery(filter: TaskFilter = {}): string {
  const params = new URLSearchParams()
  if (filter.category) params.set('category', filter.category)
  if (filter.state) params.set('state', filter.state)
  if (filter.q?.trim()) params.set('q', filter.q.trim())
  const qs = params.toString()
  return qs ? `/api/tasks?${qs}` : '/api/tasks'
}

export async function fetchTasks(filter?: TaskFilter, signal?: AbortSignal): Promise<Task[]> {
  const url = buildTasksQuery(filter)
  const res = await apiFetch(url, { signal })
  const data = await readJson<{ tasks: Task[] }>(res, `GET ${url}`)
  return data.tasks
}

export async function createTask(input: CreateTaskInput): Promise<Task> {
  const res = await apiFetch('/api/tasks', { method: 'POST', body: JSON.stringify(input) })
  const data = await readJson<{ task: Task }>(res, 'POST /api/tasks')
  return data.task
}

export async function patchTask(id: string, patch: TaskPatch): Promise<Task> {
  const res = await apiFetch(taskUrl(id), { method: 'PATCH', body: JSON.stringify(patch) })
  const data = await readJson<{ task: Task }>(res, `PATCH /api/tasks/${id}`)
  return data.task
}

export async function toggleTask(id: string): Promise<Task> {
  const res = await apiFetch(taskUrl(id, '/toggle'), { method: 'POST' })
  const data = await readJson<{ task: Task }>(res, `POST /api/tasks/${id}/toggle`)
  return data.task
}

export async function deleteTask(id: string): Promise<void> {
  const res = await apiFetch(taskUrl(id), { method: 'DELETE' })
  await readJson<{ ok: true }>(res, `DELETE /api/tasks/${id}`)
}

export async function clearCompleted(): Promise<number> {
  const res = await apiFetch('/api/tasks/clear-completed', { method: 'POST' })
  const data = await readJson<{ removed: number }>(res, 'POST /api/tasks/clear-completed')
  return data.removed
}

export async function fetchCategories(signal?: AbortSignal): Promise<string[]> {
  const res = await apiFetch('/api/categories', { signal })
  const data = await readJson<{ categories: string[] }>(res, 'GET /api/categories')
  return data.categories
}

export async function fetchStats(signal?: AbortSignal): Promise<TaskStatistics> {
  const res = await apiFetch('/api/stats', { signal })
  const data = await readJson<{ stats: TaskStatistics }>(res, 'GET /api/stats')
  return data.stats
}

export async function fetchQuickReminders(): Promise<QuickReminderOption[]> {
  const res = await apiFetch('/api/reminders/quick')
  const data = await readJson<{ options: QuickReminderOption[] }>(res, 'GET /api/reminders/quick')
  return data.options
}

/** Resolves a typed time (and optional YYYY-MM-DD date) to an ISO instant on the server's clock. */
export async function parseReminder(time: string, date?: string): Promise<string> {
  const body = date ? { time, date } : { time }
  const res = await apiFetch('/api/reminders/parse', { method: 'POST', body: JSON.stringify(body) })
  const data = await readJson<{ remindAt: string }>(res, 'POST /api/reminders/parse')
  return data.remindAt
}

export async function fetchNotifications(): Promise<Reminder[]> {
  const res = await apiFetch('/api/notifications')
  const data = await readJson<{ notifications: Reminder[] }>(res, 'GET /api/notifications')
  return data.notifications
}
