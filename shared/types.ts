export type Priority = "low" | "medium" | "high";

export interface Task {
  id: number;
  title: string;
  description: string;
  /** Conventionally a {@link Priority}, but stored as free text. */
  priority: string;
  category: string;
  completed: boolean;
  created_at: string;
  due_date: string | null;
  updated_at: string;
}

export interface TaskInput {
  title: string;
  description?: string;
  priority?: string;
  category?: string;
  due_date?: string | null;
}

export type StatusFilter = "all" | "active" | "completed";
export type DueFilter = "all" | "overdue" | "today" | "week";
export type SortMode = "default" | "due_date" | "created_at" | "priority" | "alpha";

export interface ListParams {
  category: string;
  status: StatusFilter;
  priority: string;
  due: DueFilter;
  search: string;
  sort: SortMode;
  page: number;
}

export interface ListResult {
  tasks: Task[];
  total: number;
  page: number;
  totalPages: number;
}

export interface ApiResponse<T> {
  data: T;
  error?: string;
}
