import type { ListParams, ListResult } from "../../../shared/types";
import { FilterBar } from "./FilterBar";
import { Layout } from "./Layout";
import { Pagination } from "./Pagination";
import { TaskBoard } from "./TaskBoard";
import { TaskForm } from "./TaskForm";

export interface IndexPageProps {
  params: ListParams;
  result: ListResult;
  categories: string[];
  /** Calendar date used to flag overdue tasks. */
  today: string;
}

export function IndexPage({ params, result, categories, today }: IndexPageProps) {
  const filtered =
    params.category !== "all" ||
    params.status !== "all" ||
    params.priority !== "all" ||
    params.due !== "all" ||
    params.search !== "";

  return (
    <Layout title="Tasks">
      <details className="mb-6">
        <summary className="inline-block bg-blue-600 text-white px-4 py-2 rounded-lg text-sm font-medium cursor-pointer">
          New Task
        </summary>
        <div className="mt-3">
          <TaskForm action="/add" submitLabel="Create" categories={categories} />
        </div>
      </details>

      <FilterBar params={params} categories={categories} />

      <p className="text-sm text-gray-500 mb-3">
        {result.total === 1 ? "1 task" : `${result.total} tasks`}
      </p>

      <TaskBoard tasks={result.tasks} today={today} categories={categories} filtered={filtered} />

      <Pagination params={params} page={result.page} totalPages={result.totalPages} />
    </Layout>
  );
}
