/**
 * Compiles listing parameters into a query plan and the two SQL statements
 * run for a listing page: one for the rows of the page, one for the total.
 *
 * Filters are kept as a list of clauses and compiled to SQL exactly once, so
 * the row query and the count query always share the same WHERE text and
 * parameters.
 */

import type { ListParams, SortMode } from "../../shared/types";
import { addDays } from "./dates";

export const PAGE_SIZE = 50;

/** Pages past this are clamped so the offset stays a safe integer. */
export const MAX_PAGE = 1_000_000_000;

export const TASKS_TABLE = "tasks";

export const DEFAULT_LIST_PARAMS: Readonly<ListParams> = {
  category: "all",
  status: "all",
  priority: "all",
  due: "all",
  search: "",
  sort: "default",
  page: 1,
};

export type FilterField = "category" | "priority" | "completed" | "due_date" | "title" | "description";

export type SqlValue = string | number;

export type Clause =
  | { field: FilterField; op: "=" | "<" | ">=" | "<="; value: SqlValue }
  | { field: FilterField; op: "is not null" }
  | { field: FilterField; op: "contains"; value: string }
  | { op: "any"; clauses: Clause[] };

export interface PageWindow {
  limit: number;
  offset: number;
}

export interface ListPlan {
  clauses: Clause[];
  order: readonly string[];
  window: PageWindow;
}

export interface CompiledQuery {
  sql: string;
  params: SqlValue[];
}

const LIKE_ESCAPE = "\\";

// Every ordering ends on id so equal keys page deterministically, newest first.
const ORDERINGS: Record<SortMode, readonly string[]> = {
  default: ["completed ASC", "created_at DESC", "id DESC"],
  due_date: ["due_date ASC NULLS LAST", "created_at DESC", "id DESC"],
  created_at: ["created_at DESC", "id DESC"],
  priority: [
    "CASE priority WHEN 'high' THEN 1 WHEN 'medium' THEN 2 WHEN 'low' THEN 3 ELSE 4 END",
    "created_at DESC",
    "id DESC",
  ],
  alpha: ["title COLLATE NOCASE ASC", "id DESC"],
};

/** Escapes LIKE wildcards so the text matches literally under `ESCAPE '\'`. */
export function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (ch) => LIKE_ESCAPE + ch);
}

/**
 * Builds the filter clauses for a parameter bundle. `today` is the calendar
 * date (yyyy-MM-dd) the due-date windows are measured from.
 */
export function buildClauses(params: ListParams, today: string): Clause[] {
  const clauses: Clause[] = [];

  if (params.category !== "all") {
    clauses.push({ field: "category", op: "=", value: params.category });
  }

  if (params.status === "active") {
    clauses.push({ field: "completed", op: "=", value: 0 });
  } else if (params.status === "completed") {
    clauses.push({ field: "completed", op: "=", value: 1 });
  }

  if (params.priority !== "all") {
    clauses.push({ field: "priority", op: "=", value: params.priority });
  }

  switch (params.due) {
    case "overdue":
      clauses.push({ field: "due_date", op: "is not null" }, { field: "due_date", op: "<", value: today });
      break;
    case "today":
      clauses.push({ field: "due_date", op: "=", value: today });
      break;
    case "week":
      clauses.push(
        { field: "due_date", op: "is not null" },
        { field: "due_date", op: ">=", value: today },
        { field: "due_date", op: "<=", value: addDays(today, 7) }
      );
      break;
    case "all":
      break;
  }

  const search = params.search.trim();
  if (search) {
    clauses.push({
      op: "any",
      clauses: [
        { field: "title", op: "contains", value: search },
        { field: "description", op: "contains", value: search },
      ],
    });
  }

  return clauses;
}

export function pageWindow(page: number): PageWindow {
  const current = Number.isFinite(page) ? Math.min(MAX_PAGE, Math.max(1, Math.trunc(page))) : 1;
  return { limit: PAGE_SIZE, offset: (current - 1) * PAGE_SIZE };
}

export function compilePlan(params: ListParams, today: string): ListPlan {
  return {
    clauses: buildClauses(params, today),
    order: ORDERINGS[params.sort],
    window: pageWindow(params.page),
  };
}

function compileClause(clause: Clause): CompiledQuery {
  switch (clause.op) {
    case "any": {
      const parts = clause.clauses.map(compileClause);
      if (parts.length === 0) return { sql: "0", params: [] };
      return {
        sql: `(${parts.map((p) => p.sql).join(" OR ")})`,
        params: parts.flatMap((p) => p.params),
      };
    }
    case "is not null":
      return { sql: `${clause.field} IS NOT NULL`, params: [] };
    case "contains":
      return {
        sql: `${clause.field} LIKE ? ESCAPE '${LIKE_ESCAPE}'`,
        params: [`%${escapeLike(clause.value)}%`],
      };
    default:
      return { sql: `${clause.field} ${clause.op} ?`, params: [clause.value] };
  }
}

/** Compiles clauses into a `WHERE ...` fragment; empty when there are none. */
export function compileWhere(clauses: Clause[]): CompiledQuery {
  const parts = clauses.map(compileClause);
  if (parts.length === 0) return { sql: "", params: [] };
  return {
    sql: `WHERE ${parts.map((p) => p.sql).join(" AND ")}`,
    params: parts.flatMap((p) => p.params),
  };
}

export function compileQueries(plan: ListPlan): { rows: CompiledQuery; count: CompiledQuery } {
  const where = compileWhere(plan.clauses);
  const rowSql = [`SELECT * FROM ${TASKS_TABLE}`, where.sql, `ORDER BY ${plan.order.join(", ")}`, "LIMIT ? OFFSET ?"];
  const countSql = [`SELECT COUNT(*) AS total FROM ${TASKS_TABLE}`, where.sql];

  return {
    rows: {
      sql: rowSql.filter(Boolean).join(" "),
      params: [...where.params, plan.window.limit, plan.window.offset],
    },
    count: {
      sql: countSql.filter(Boolean).join(" "),
      params: [...where.params],
    },
  };
}

export function totalPages(total: number): number {
  return Math.ceil(total / PAGE_SIZE);
}
