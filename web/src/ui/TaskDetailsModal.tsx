import { useEffect, useRef, useState } from 'react'
import type { QuickReminderOption, Task } from '../api/types.js'
import type { TaskPatch } from '../api/client.js'
import { fetchQuickReminders, parseReminder } from '../api/client.js'
import { errorText, formatReminder, fromLocalInputValue, toLocalInputValue } from './format.js'

export function TaskDetailsModal(props: {
  task: Task
  categories: string[]
  onClose: () => void
  onPatch: (id: string, patch: TaskPatch) => Promise<void>
}) {
  const { task } = props

  const [title, setTitle] = useState(task.title)
  const [category, setCategory] = useState(task.category)
  const [completed, setCompleted] = useState(task.completed)
  const [remindAt, setRemindAt] = useState(toLocalInputValue(task.remindAt))

  const [typedTime, setTypedTime] = useState('')
  const [quick, setQuick] = useState<QuickReminderOption[]>([])
  const [saving, setSaving] = useState(false)
  const [saveError, setSaveError] = useState<string | null>(null)

  const titleRef = useRef<HTMLInputElement | null>(null)

  // If the selected task changes while modal is open, reset local state.
  useEffect(() => {
    setTitle(task.title)
    setCategory(task.category)
    setCompleted(task.completed)
    setRemindAt(toLocalInputValue(task.remindAt))
    setSaveError(null)
  }, [task])

  useEffect(() => {
    titleRef.current?.focus()
    fetchQuickReminders().then(setQuick, (e: unknown) => setSaveError(errorText(e)))
  }, [])

  // A category that is no longer configured still has to be selectable.
  const categoryOptions = props.categories.includes(task.category)
    ? props.categories
    : [...props.categories, task.category]

  // "14:30" or "2:30 PM"; the server reads it as today, or tomorrow once passed.
  async function applyTypedTime() {
    const time = typedTime.trim()
    if (!time) return
    setSaveError(null)
    try {
      setRemindAt(toLocalInputValue(await parseReminder(time)))
      setTypedTime('')
    } catch (e) {
      setSaveError(errorText(e))
    }
  }

  async function save() {
    const patch: TaskPatch = {}
    const nextTitle = title.trim()
    if (!nextTitle) {
      setSaveError('Title is required')
      return
    }
    if (nextTitle !== task.title) patch.title = nextTitle
    if (category !== task.category) patch.category = category
    if (completed !== task.completed) patch.completed = completed

    const nextRemindAt = fromLocalInputValue(remindAt)
    // Compare at minute precision, the precision of the input.
    if (toLocalInputValue(nextRemindAt) !== toLocalInputValue(task.remindAt)) patch.remindAt = nextRemindAt

    if (Object.keys(patch).length === 0) {
      props.onClose()
      return
    }

    setSaving(true)
    setSaveError(null)
    try {
      await props.onPatch(task.id, patch)
      props.onClose()
    } catch (e) {
      setSaveError(errorText(e))
    } finally {
      setSaving(false)
    }
  }

  return (
    <div
      className="modal-overlay"
      role="dialog"
      aria-modal="true"
      onMouseDown={(e) => {
        if (e.target === e.currentTarget) props.onClose()
      }}
      onKeyDown={(e) => {
        if (e.key === 'Escape') props.onClose()
      }}
      tabIndex={-1}
    >
      <div className="modal">
        <div className="modal-header">
          <div>
            <div className="modal-title">Task</div>
            <div className="modal-subtitle">
              <span className="pill">{task.id}</span>
              <span className="pill">Created {formatReminder(task.createdAt)}</span>
              {task.completedAt ? <span className="pill">Done {formatReminder(task.completedAt)}</span> : null}
            </div>
          </div>
          <button className="btn btn--ghost" onClick={props.onClose} disabled={saving}>
            Close
          </button>
        </div>

        {saveError ? <div className="modal-error">{saveError}</div> : null}

        <div className="modal-body">
          <label className="control">
            <span>Title</span>
            <input
              ref={titleRef}
              value={title}
              onChange={(e) => setTitle(e.target.value)}
              onKeyDown={(e) => {
                if (e.key === 'Enter') void save()
              }}
            />
          </label>

          <label className="control">
            <span>Category</span>
            <select value={category} onChange={(e) => setCategory(e.target.value)}>
              {categoryOptions.map((c) => (
                <option key={c} value={c}>
                  {c}
                </option>
              ))}
            </select>
          </label>

          <label className="control control--inline">
            <input type="checkbox" checked={completed} onChange={(e) => setCompleted(e.target.checked)} />
            <span>Completed</span>
          </label>

          <label className="control">
            <span>Reminder</span>
            <input type="datetime-local" value={remindAt} onChange={(e) => setRemindAt(e.target.value)} />
          </label>

          <label className="control">
            <span>Remind at time</span>
            <input
              value={typedTime}
              placeholder="14:30 or 2:30 PM"
              onChange={(e) => setTypedTime(e.target.value)}
              onKeyDown={(e) => {
                if (e.key === 'Enter') void applyTypedTime()
              }}
            />
          </label>
          <button className="btn btn--small" onClick={() => void applyTypedTime()} disabled={!typedTime.trim()}>
            Use time
          </button>

          <div className="quick-reminders">
            {quick.map((o) => (
              <button key={o.label} className="btn btn--small" onClick={() => setRemindAt(toLocalInputValue(o.remindAt))}>
                {o.label}
              </button>
            ))}
            <button className="btn btn--small btn--ghost" onClick={() => setRemindAt('')} disabled={!remindAt}>
              No reminder
            </button>
          </div>
        </div>

        <div className="modal-footer">
          <button className="btn" onClick={() => void save()} disabled={saving}>
            {saving ? 'Saving…' : 'Save'}
          </button>
        </div>
      </div>
    </div>
  )
}
