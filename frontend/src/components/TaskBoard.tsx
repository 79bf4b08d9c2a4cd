import type { Task } from "../../../shared/types";
import { TaskCard } from "./TaskCard";

interface Props {
  tasks: Task[];
  today: string;
  categories: string[];
  filtered: boolean;
}

export function TaskBoard({ tasks, today, categories, filtered }: Props) {
  if (tasks.length === 0) {
    return (
      <div className="text-center py-12 text-gray-400">
        {filtered ? "No tasks match these filters." : "No tasks yet. Create one to get started."}
      </div>
    );
  }

  return (
    <div className="grid gap-3">
      {tasks.map((task) => (
        <TaskCard key={task.id} task={task} today={today} categories={categories} />
      ))}
    </div>
  );
}
