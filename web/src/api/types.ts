export type TaskState = 'pending' | 'completed'

export type Task = {
  id: string
  title: string
  category: string
  completed: boolean
  remindAt: string | null
  createdAt: string
  completedAt: string | null
}

export type Reminder = {
  taskId: string
  taskTitle: string
  remindAt: string
  notified: boolean
}

export type CategoryStats = {
  category: string
  total: number
  completed: number
  rate: number
}

export type TaskStatistics = {
  total: number
  completed: number
  pending: number
  completionRate: number
  categories: CategoryStats[]
  upcoming: Reminder[]
}

export type QuickReminderOption = {
  label: string
  remindAt: string
}

export type TaskFilter = {
  category?: string
  state?: TaskState
  q?: string
}
