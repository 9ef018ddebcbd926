import { useDraggable } from '@dnd-kit/core'
import { CSS } from '@dnd-kit/utilities'
import type { CSSProperties } from 'react'
import type { Task } from '../api/types.js'
import { formatReminder } from './format.js'

export function TaskCard(props: {
  task: Task
  onOpen: () => void
  onToggle: () => void
  onDelete: () => void
}) {
  const { task } = props
  const { attributes, listeners, setNodeRef, transform, isDragging } = useDraggable({
    id: task.id,
  })

  const style: CSSProperties = {
    transform: CSS.Translate.toString(transform),
    opacity: isDragging ? 0.4 : 1,
  }

  return (
    <article
      ref={setNodeRef}
      style={style}
      className={`card ${task.completed ? 'card--done' : ''} ${isDragging ? 'card--dragging' : ''}`}
      {...listeners}
      {...attributes}
    >
      <div className="card-row">
        <button
          className="check"
          title={task.completed ? 'Mark as pending' : 'Mark as completed'}
          onClick={props.onToggle}
        >
          {task.completed ? '✓' : '○'}
        </button>
        <div className="task-title" onClick={props.onOpen}>
          {task.title}
        </div>
        <button className="btn btn--ghost btn--small" title="Delete" onClick={props.onDelete}>
          ×
        </button>
      </div>
      <div className="task-meta">
        <span className="pill">{task.id}</span>
        {task.remindAt ? <span className="pill pill--reminder">⏰ {formatReminder(task.remindAt)}</span> : null}
      </div>
    </article>
  )
}
