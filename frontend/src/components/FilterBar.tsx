import type { DueFilter, ListParams, SortMode, StatusFilter } from "../../../shared/types";

interface Props {
  params: ListParams;
  categories: string[];
}

const STATUS_LABELS: Record<StatusFilter, string> = {
  all: "All",
  active: "Active",
  completed: "Completed",
};

const DUE_LABELS: Record<DueFilter, string> = {
  all: "Any time",
  overdue: "Overdue",
  today: "Due today",
  week: "Next 7 days",
};

const SORT_LABELS: Record<SortMode, string> = {
  default: "Open first",
  due_date: "Due date",
  created_at: "Newest",
  priority: "Priority",
  alpha: "Title A-Z",
};

const SELECT_CLASS = "rounded-lg border border-gray-300 px-2 py-1 text-sm";

function withCurrent(values: string[], current: string): string[] {
  return current === "all" || values.includes(current) ? values : [...values, current];
}

export function FilterBar({ params, categories }: Props) {
  return (
    <form method="get" action="/" className="flex flex-wrap items-center gap-2 mb-6">
      <input
        type="search"
        name="q"
        defaultValue={params.search}
        placeholder="Search tasks"
        className="rounded-lg border border-gray-300 px-3 py-1 text-sm"
      />

      <select name="category" defaultValue={params.category} className={SELECT_CLASS}>
        <option value="all">All categories</option>
        {withCurrent(categories, params.category).map((c) => (
          <option key={c} value={c}>
            {c}
          </option>
        ))}
      </select>

      <select name="status" defaultValue={params.status} className={SELECT_CLASS}>
        {Object.entries(STATUS_LABELS).map(([value, label]) => (
          <option key={value} value={value}>
            {label}
          </option>
        ))}
      </select>

      <select name="priority" defaultValue={params.priority} className={SELECT_CLASS}>
        <option value="all">Any priority</option>
        {withCurrent(["high", "medium", "low"], params.priority).map((p) => (
          <option key={p} value={p}>
            {p.charAt(0).toUpperCase() + p.slice(1)}
          </option>
        ))}
      </select>

      <select name="due" defaultValue={params.due} className={SELECT_CLASS}>
        {Object.entries(DUE_LABELS).map(([value, label]) => (
          <option key={value} value={value}>
            {label}
          </option>
        ))}
      </select>

      <select name="sort" defaultValue={params.sort} className={SELECT_CLASS}>
        {Object.entries(SORT_LABELS).map(([value, label]) => (
          <option key={value} value={value}>
            {label}
          </option>
        ))}
      </select>

      <button type="submit" className="bg-blue-100 text-blue-800 px-3 py-1 rounded-full text-sm">
        Apply
      </button>
      <a href="/" className="text-sm text-gray-500">
        Clear
      </a>
    </form>
  );
}
