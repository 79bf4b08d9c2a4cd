import { bootstrapSchema, openDatabase, type TodoDb } from "./db";
import { formatDate, addDays } from "./dates";
import { insertTask, toggleTask } from "./queries";
import { TASKS_TABLE } from "./query-plan";
import type { TaskInput } from "../../shared/types";

/**
 * Inserts a few sample tasks when the table is empty. Returns how many were added.
 */
export function seedTasks(db: TodoDb, now: Date = new Date()): number {
  const existing = db.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${TASKS_TABLE}`).get();
  if (existing && existing.total > 0) return 0;

  const today = formatDate(now);
  const tasks: Array<TaskInput & { completed?: boolean }> = [
    { title: "Pay rent", description: "Transfer before the 1st", priority: "high", category: "personal", due_date: addDays(today, -1) },
    { title: "Review pull requests", description: "", priority: "medium", category: "work", due_date: today },
    { title: "Plan team offsite", description: "Shortlist three venues", priority: "low", category: "work", due_date: addDays(today, 5) },
    { title: "Book dentist appointment", priority: "medium", category: "health" },
    { title: "Renew library card", priority: "low", category: "personal", completed: true },
  ];

  const insertAll = db.transaction(() => {
    for (const t of tasks) {
      const task = insertTask(db, t, now);
      if (t.completed) toggleTask(db, task.id, now);
    }
  });
  insertAll();
  return tasks.length;
}

if (require.main === module) {
  const db = openDatabase(process.env.DB_PATH || "data/todo.db");
  bootstrapSchema(db);
  const count = seedTasks(db);
  db.close();
  console.log(count > 0 ? `Seeded ${count} tasks.` : "Tasks already present, nothing seeded.");
}
