import type { Priority, Task } from "../../../shared/types";
import { TaskForm } from "./TaskForm";

interface Props {
  task: Task;
  today: string;
  categories: string[];
}

const PRIORITY_COLORS: Record<Priority, string> = {
  low: "bg-gray-100 text-gray-700",
  medium: "bg-yellow-100 text-yellow-800",
  high: "bg-red-100 text-red-800",
};

function priorityColor(priority: string): string {
  if (priority === "low" || priority === "medium" || priority === "high") {
    return PRIORITY_COLORS[priority];
  }
  return "bg-blue-100 text-blue-800";
}

export function TaskCard({ task, today, categories }: Props) {
  const overdue = !task.completed && task.due_date !== null && task.due_date < today;

  return (
    <div className="bg-white rounded-lg border border-gray-200 p-4" data-task-id={task.id}>
      <div className="flex items-center gap-4">
        <a
          href={`/toggle/${task.id}`}
          className={`px-2 py-1 rounded text-xs font-medium ${
            task.completed ? "bg-green-100 text-green-800" : "bg-gray-100 text-gray-700"
          }`}
        >
          {task.completed ? "Done" : "Open"}
        </a>

        <div className="flex-1 min-w-0">
          <h3 className={`font-medium truncate ${task.completed ? "text-gray-400 line-through" : "text-gray-900"}`}>
            {task.title}
          </h3>
          {task.description && <p className="text-sm text-gray-500 truncate">{task.description}</p>}
        </div>

        <span className={`px-2 py-1 rounded text-xs ${priorityColor(task.priority)}`}>{task.priority}</span>
        <span className="text-sm text-gray-400">{task.category}</span>
        {task.due_date && (
          <span className={`text-sm ${overdue ? "text-red-600 font-medium" : "text-gray-500"}`}>{task.due_date}</span>
        )}

        <a href={`/delete/${task.id}`} className="text-gray-300 hover:text-red-500 text-sm">
          Delete
        </a>
      </div>

      <details className="mt-3">
        <summary className="text-sm text-blue-600 cursor-pointer">Edit</summary>
        <div className="mt-2">
          <TaskForm action={`/edit/${task.id}`} submitLabel="Save" task={task} categories={categories} />
        </div>
      </details>
    </div>
  );
}
