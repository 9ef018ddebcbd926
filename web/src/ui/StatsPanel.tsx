import type { TaskStatistics } from '../api/types.js'
import { formatReminder } from './format.js'

export function StatsPanel(props: { stats: TaskStatistics | null }) {
  const { stats } = props
  if (!stats) return null

  return (
    <aside className="stats">
      <div className="stats-overall">
        <span className="pill">Total {stats.total}</span>
        <span className="pill">Completed {stats.completed}</span>
        <span className="pill">Pending {stats.pending}</span>
        <span className="pill">{stats.completionRate.toFixed(1)}% done</span>
      </div>
      {stats.upcoming.length ? (
        <ul className="stats-upcoming">
          {stats.upcoming.map((r) => (
            <li key={r.taskId}>
              <span className="pill pill--reminder">{formatReminder(r.remindAt)}</span> {r.taskTitle}
            </li>
          ))}
        </ul>
      ) : (
        <div className="stats-empty">No reminders in the next 24 hours</div>
      )}
    </aside>
  )
}
