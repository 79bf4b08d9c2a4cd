import type { TodoDb } from "./db";
import { NotFoundError, StorageError, TodoError, ValidationError } from "../../shared/errors";
import type { ListParams, ListResult, Task, TaskInput } from "../../shared/types";
import { compilePlan, compileQueries, PAGE_SIZE, TASKS_TABLE, totalPages, type ListPlan, type SqlValue } from "./query-plan";
import { formatDate, isCalendarDate } from "./dates";

export const DEFAULT_PRIORITY = "medium";
export const DEFAULT_CATEGORY = "personal";

interface TaskRow {
  id: number;
  title: string;
  description: string | null;
  priority: string | null;
  category: string | null;
  completed: number;
  created_at: string;
  due_date: string | null;
  updated_at: string | null;
}

type TaskFields = Required<TaskInput>;

function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    title: row.title,
    description: row.description ?? "",
    priority: row.priority ?? DEFAULT_PRIORITY,
    category: row.category ?? DEFAULT_CATEGORY,
    completed: row.completed !== 0,
    created_at: row.created_at,
    due_date: row.due_date,
    updated_at: row.updated_at ?? row.created_at,
  };
}

/**
 * Applies the form defaults and checks the title. Blank optional fields fall
 * back to their defaults; a due date that is not yyyy-MM-dd is dropped.
 */
export function normalizeInput(input: TaskInput): TaskFields {
  const title = input.title?.trim() ?? "";
  if (!title) {
    throw new ValidationError("Title is required", "title");
  }
  const dueDate = input.due_date?.trim();
  return {
    title,
    description: input.description ?? "",
    priority: input.priority?.trim() || DEFAULT_PRIORITY,
    category: input.category?.trim() || DEFAULT_CATEGORY,
    due_date: dueDate && isCalendarDate(dueDate) ? dueDate : null,
  };
}

function withStorage<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof TodoError) throw err;
    throw new StorageError(operation, err);
  }
}

export function getTaskById(db: TodoDb, id: number): Task | undefined {
  return withStorage("get task", () => {
    const row = db.prepare<[number], TaskRow>(`SELECT * FROM ${TASKS_TABLE} WHERE id = ?`).get(id);
    return row ? toTask(row) : undefined;
  });
}

function requireTask(db: TodoDb, id: number): Task {
  const task = getTaskById(db, id);
  if (!task) throw new NotFoundError(id);
  return task;
}

export function insertTask(db: TodoDb, input: TaskInput, now: Date = new Date()): Task {
  const fields = normalizeInput(input);
  const timestamp = now.toISOString();
  const id = withStorage("insert task", () => {
    const result = db
      .prepare<[string, string, string, string, string | null, string, string]>(
        `INSERT INTO ${TASKS_TABLE} (title, description, priority, category, due_date, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(fields.title, fields.description, fields.priority, fields.category, fields.due_date, timestamp, timestamp);
    return Number(result.lastInsertRowid);
  });
  return requireTask(db, id);
}

/** Overwrites every mutable field of a task. */
export function updateTask(db: TodoDb, id: number, input: TaskInput, now: Date = new Date()): Task {
  const fields = normalizeInput(input);
  const changes = withStorage("update task", () => {
    const result = db
      .prepare<[string, string, string, string, string | null, string, number]>(
        `UPDATE ${TASKS_TABLE}
         SET title = ?, description = ?, priority = ?, category = ?, due_date = ?, updated_at = MAX(created_at, ?)
         WHERE id = ?`
      )
      .run(fields.title, fields.description, fields.priority, fields.category, fields.due_date, now.toISOString(), id);
    return result.changes;
  });
  if (changes === 0) throw new NotFoundError(id);
  return requireTask(db, id);
}

export function toggleTask(db: TodoDb, id: number, now: Date = new Date()): Task {
  const changes = withStorage("toggle task", () => {
    const result = db
      .prepare<[string, number]>(
        `UPDATE ${TASKS_TABLE}
         SET completed = CASE completed WHEN 0 THEN 1 ELSE 0 END, updated_at = MAX(created_at, ?)
         WHERE id = ?`
      )
      .run(now.toISOString(), id);
    return result.changes;
  });
  if (changes === 0) throw new NotFoundError(id);
  return requireTask(db, id);
}

export function removeTask(db: TodoDb, id: number): void {
  const changes = withStorage("delete task", () => {
    return db.prepare<[number]>(`DELETE FROM ${TASKS_TABLE} WHERE id = ?`).run(id).changes;
  });
  if (changes === 0) throw new NotFoundError(id);
}

/**
 * Runs the row and count queries of a plan inside one read transaction, so
 * the total always describes the same table state as the rows.
 */
export function listTasks(db: TodoDb, plan: ListPlan): { tasks: Task[]; total: number } {
  const queries = compileQueries(plan);
  return withStorage("list tasks", () => {
    const read = db.transaction(() => {
      const rows = db.prepare<SqlValue[], TaskRow>(queries.rows.sql).all(...queries.rows.params);
      const count = db.prepare<SqlValue[], { total: number }>(queries.count.sql).get(...queries.count.params);
      return { tasks: rows.map(toTask), total: count?.total ?? 0 };
    });
    return read();
  });
}

/** Compiles `params` against the calendar date of `now` and fetches that page. */
export function queryTasks(db: TodoDb, params: ListParams, now: Date = new Date()): ListResult {
  const plan = compilePlan(params, formatDate(now));
  const { tasks, total } = listTasks(db, plan);
  return {
    tasks,
    total,
    page: plan.window.offset / PAGE_SIZE + 1,
    totalPages: totalPages(total),
  };
}

export function getCategories(db: TodoDb): string[] {
  return withStorage("list categories", () => {
    const rows = db
      .prepare<[], { category: string }>(
        `SELECT DISTINCT category FROM ${TASKS_TABLE}
         WHERE category IS NOT NULL AND category != ''
         ORDER BY category`
      )
      .all();
    return rows.map((r) => r.category);
  });
}
