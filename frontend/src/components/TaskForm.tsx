import type { Task } from "../../../shared/types";

interface Props {
  action: string;
  submitLabel: string;
  task?: Task;
  categories: string[];
}

const PRIORITY_OPTIONS: readonly string[] = ["low", "medium", "high"];

// Priority is free text; a stored value outside the presets stays selectable.
function priorityOptions(current: string | undefined): readonly string[] {
  return current === undefined || PRIORITY_OPTIONS.includes(current) ? PRIORITY_OPTIONS : [...PRIORITY_OPTIONS, current];
}

export function TaskForm({ action, submitLabel, task, categories }: Props) {
  const listId = task ? `categories-${task.id}` : "categories-new";

  return (
    <form method="post" action={action} className="bg-white rounded-xl border border-gray-200 p-4 grid gap-3">
      <label className="block">
        <span className="text-sm text-gray-600">Title</span>
        <input
          name="title"
          defaultValue={task?.title}
          required
          className="mt-1 block w-full rounded-lg border border-gray-300 px-3 py-2 text-sm"
        />
      </label>

      <label className="block">
        <span className="text-sm text-gray-600">Description</span>
        <textarea
          name="description"
          defaultValue={task?.description}
          className="mt-1 block w-full rounded-lg border border-gray-300 px-3 py-2 text-sm"
          rows={2}
        />
      </label>

      <div className="grid grid-cols-3 gap-3">
        <label className="block">
          <span className="text-sm text-gray-600">Priority</span>
          <select
            name="priority"
            defaultValue={task?.priority ?? "medium"}
            className="mt-1 block w-full rounded-lg border border-gray-300 px-3 py-2 text-sm"
          >
            {priorityOptions(task?.priority).map((p) => (
              <option key={p} value={p}>
                {p.charAt(0).toUpperCase() + p.slice(1)}
              </option>
            ))}
          </select>
        </label>

        <label className="block">
          <span className="text-sm text-gray-600">Category</span>
          <input
            name="category"
            list={listId}
            defaultValue={task?.category ?? "personal"}
            className="mt-1 block w-full rounded-lg border border-gray-300 px-3 py-2 text-sm"
          />
          <datalist id={listId}>
            {categories.map((c) => (
              <option key={c} value={c} />
            ))}
          </datalist>
        </label>

        <label className="block">
          <span className="text-sm text-gray-600">Due date</span>
          <input
            type="date"
            name="due_date"
            defaultValue={task?.due_date ?? ""}
            className="mt-1 block w-full rounded-lg border border-gray-300 px-3 py-2 text-sm"
          />
        </label>
      </div>

      <div className="flex justify-end">
        <button
          type="submit"
          className="bg-blue-600 text-white px-4 py-2 rounded-lg text-sm font-medium hover:bg-blue-700"
        >
          {submitLabel}
        </button>
      </div>
    </form>
  );
}
