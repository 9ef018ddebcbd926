import { useEffect, useMemo, useState } from 'react'
import {
  DndContext,
  DragOverlay,
  type DragEndEvent,
  type DragStartEvent,
  PointerSensor,
  useSensor,
  useSensors,
} from '@dnd-kit/core'
import type { Reminder, Task, TaskState, TaskStatistics } from '../api/types.js'
import {
  clearCompleted,
  createTask,
  deleteTask,
  fetchCategories,
  fetchNotifications,
  fetchStats,
  fetchTasks,
  patchTask,
  toggleTask,
  type TaskPatch,
} from '../api/client.js'
import { KanbanColumn } from './KanbanColumn.js'
import { StatsPanel } from './StatsPanel.js'
import { TaskCard } from './TaskCard.js'
import { TaskDetailsModal } from './TaskDetailsModal.js'
import { errorText, formatReminder } from './format.js'

const NOTIFICATION_POLL_MS = 5000

type StateFilter = 'all' | TaskState

export function App() {
  const [items, setItems] = useState<Task[] | null>(null)
  const [categories, setCategories] = useState<string[]>([])
  const [stats, setStats] = useState<TaskStatistics | null>(null)
  const [error, setError] = useState<string | null>(null)
  const [loading, setLoading] = useState(false)
  const [activeId, setActiveId] = useState<string | null>(null)
  const [selectedTask, setSelectedTask] = useState<Task | null>(null)

  const [query, setQuery] = useState('')
  const [stateFilter, setStateFilter] = useState<StateFilter>('all')

  const [newTitle, setNewTitle] = useState('')
  const [newCategory, setNewCategory] = useState('')
  const [submitting, setSubmitting] = useState(false)

  const [alerts, setAlerts] = useState<Reminder[]>([])

  const sensors = useSensors(
    useSensor(PointerSensor, {
      activationConstraint: { distance: 4 },
    }),
  )

  async function reload() {
    setLoading(true)
    setError(null)
    try {
      const ctrl = new AbortController()
      const [tasks, cats, st] = await Promise.all([
        fetchTasks(undefined, ctrl.signal),
        fetchCategories(ctrl.signal),
        fetchStats(ctrl.signal),
      ])
      setItems(tasks)
      setCategories(cats)
      setStats(st)
    } catch (e) {
      setError(errorText(e))
      setItems(null)
    } finally {
      setLoading(false)
    }
  }

  useEffect(() => {
    void reload()
  }, [])

  // Reminders fire on the server; pick them up here.
  useEffect(() => {
    const timer = setInterval(() => {
      fetchNotifications().then(
        (fired) => {
          if (fired.length) setAlerts((prev) => [...prev, ...fired])
        },
        (e: unknown) => setError(errorText(e)),
      )
    }, NOTIFICATION_POLL_MS)
    return () => clearInterval(timer)
  }, [])

  const filtered = useMemo(() => {
    const q = query.trim().toLowerCase()
    return (items ?? []).filter((t) => {
      if (stateFilter === 'pending' && t.completed) return false
      if (stateFilter === 'completed' && !t.completed) return false
      if (!q) return true
      return t.title.toLowerCase().includes(q) || t.category.toLowerCase().includes(q)
    })
  }, [items, query, stateFilter])

  // Configured categories first, then any extra ones tasks still carry.
  const columns = useMemo(() => {
    const out = [...categories]
    for (const t of items ?? []) if (!out.includes(t.category)) out.push(t.category)
    return out
  }, [categories, items])

  const byCategory = useMemo(() => {
    const map = new Map<string, Task[]>()
    for (const c of columns) map.set(c, [])
    for (const t of filtered) map.get(t.category)?.push(t)
    return map
  }, [columns, filtered])

  function onDragStart(e: DragStartEvent) {
    setActiveId(String(e.active.id))
  }

  function onDragEnd(e: DragEndEvent) {
    setActiveId(null)
    const id = String(e.active.id)
    const category = e.over?.id ? String(e.over.id) : null
    if (!category || !columns.includes(category)) return

    const current = (items ?? []).find((t) => t.id === id)
    if (!current || current.category === category) return

    applyPatch(id, { category }).catch((err: unknown) => setError(errorText(err)))
  }

  // Optimistic update; rolled back if the server refuses.
  async function applyPatch(id: string, patch: TaskPatch) {
    const prevItems = items
    setItems((prev) => (prev ?? []).map((t) => (t.id === id ? { ...t, ...patch } : t)))
    try {
      await patchTask(id, patch)
      void reload()
    } catch (err) {
      setError(errorText(err))
      setItems(prevItems)
      throw err
    }
  }

  async function run(action: () => Promise<unknown>): Promise<boolean> {
    try {
      await action()
    } catch (err) {
      setError(errorText(err))
      return false
    }
    await reload()
    return true
  }

  async function onAdd() {
    const title = newTitle.trim()
    if (!title) return
    setSubmitting(true)
    // Keep the typed title when the add fails.
    if (await run(() => createTask({ title, category: newCategory || categories[0] }))) setNewTitle('')
    setSubmitting(false)
  }

  const activeTask = useMemo(() => {
    if (!activeId || !items) return null
    return items.find((t) => t.id === activeId) ?? null
  }, [activeId, items])

  const completedCount = (items ?? []).filter((t) => t.completed).length

  return (
    <div className="app">
      <header className="topbar">
        <div className="brand">To-Do</div>
        <div className="controls">
          <label className="control grow">
            <span>New task</span>
            <input
              value={newTitle}
              onChange={(e) => setNewTitle(e.target.value)}
              onKeyDown={(e) => {
                if (e.key === 'Enter') void onAdd()
              }}
              placeholder="What needs to be done?"
            />
          </label>

          <label className="control">
            <span>Category</span>
            <select value={newCategory || categories[0] || ''} onChange={(e) => setNewCategory(e.target.value)}>
              {categories.map((c) => (
                <option key={c} value={c}>
                  {c}
                </option>
              ))}
            </select>
          </label>

          <button className="btn" onClick={() => void onAdd()} disabled={submitting || !newTitle.trim()}>
            {submitting ? 'Adding…' : 'Add'}
          </button>

          <label className="control">
            <span>Show</span>
            <select value={stateFilter} onChange={(e) => setStateFilter(parseStateFilter(e.target.value))}>
              <option value="all">All</option>
              <option value="pending">Pending</option>
              <option value="completed">Completed</option>
            </select>
          </label>

          <label className="control grow">
            <span>Search</span>
            <input value={query} onChange={(e) => setQuery(e.target.value)} placeholder="title or category…" />
          </label>

          <button
            className="btn"
            onClick={() => {
              if (window.confirm(`Delete ${completedCount} completed task(s)?`)) void run(clearCompleted)
            }}
            disabled={loading || completedCount === 0}
          >
            Clear completed
          </button>

          <button className="btn" onClick={() => void reload()} disabled={loading}>
            {loading ? 'Loading…' : 'Refresh'}
          </button>
        </div>
      </header>

      {error ? (
        <div className="error">
          <div className="error-title">Error</div>
          <pre className="error-body">{error}</pre>
        </div>
      ) : null}

      {alerts.length ? (
        <div className="alerts">
          {alerts.map((r) => (
            <div key={`${r.taskId}@${r.remindAt}`} className="alert">
              <span>
                ⏰ {formatReminder(r.remindAt)} {r.taskTitle}
              </span>
              <button
                className="btn btn--ghost btn--small"
                onClick={() => setAlerts((prev) => prev.filter((x) => x !== r))}
              >
                Dismiss
              </button>
            </div>
          ))}
        </div>
      ) : null}

      <StatsPanel stats={stats} />

      {selectedTask ? (
        <TaskDetailsModal
          task={selectedTask}
          categories={categories}
          onClose={() => setSelectedTask(null)}
          onPatch={applyPatch}
        />
      ) : null}

      <DndContext sensors={sensors} onDragStart={onDragStart} onDragEnd={onDragEnd}>
        <main className="board">
          {columns.map((c) => {
            const tasks = byCategory.get(c) ?? []
            return (
              <KanbanColumn
                key={c}
                id={c}
                title={c}
                count={tasks.length}
                done={tasks.filter((t) => t.completed).length}
              >
                {tasks.map((t) => (
                  <TaskCard
                    key={t.id}
                    task={t}
                    onOpen={() => setSelectedTask(t)}
                    onToggle={() => void run(() => toggleTask(t.id))}
                    onDelete={() => {
                      if (window.confirm(`Delete "${t.title}"?`)) void run(() => deleteTask(t.id))
                    }}
                  />
                ))}
              </KanbanColumn>
            )
          })}
        </main>

        <DragOverlay>
          {activeTask ? (
            <div className="drag-overlay-card">
              <div className="task-title">{activeTask.title}</div>
              <div className="task-meta">
                <span className="pill">{activeTask.id}</span>
                <span className="pill">{activeTask.category}</span>
              </div>
            </div>
          ) : null}
        </DragOverlay>
      </DndContext>
    </div>
  )
}

function parseStateFilter(value: string): StateFilter {
  return value === 'pending' || value === 'completed' ? value : 'all'
}
