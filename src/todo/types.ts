export const DEFAULT_CATEGORY = 'General';
export const DEFAULT_CATEGORIES: readonly string[] = ['General', 'Work', 'Life', 'Study', 'Health'];

export interface Task {
  id: string;
  title: string;
  category: string;
  completed: boolean;
  remindAt: string | null; // ISO-8601
  createdAt: string; // ISO-8601
  completedAt: string | null; // ISO-8601
}

// On-disk shape of one element of data/tasks.json.
export interface TaskRecordV1 {
  id: string;
  title: string;
  category: string;
  completed: boolean;
  remind_at: string | null;
  created_at: string;
  completed_at: string | null;
}

export interface CreateTaskInput {
  title: string;
  category?: string;
  remindAt?: string | null;
}

export interface TaskPatch {
  title?: string;
  category?: string;
  completed?: boolean;
  remindAt?: string | null;
}

export type TaskState = 'pending' | 'completed';
