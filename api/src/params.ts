import type { DueFilter, ListParams, SortMode, StatusFilter, TaskInput } from "../../shared/types";

export const STATUS_FILTERS: readonly StatusFilter[] = ["all", "active", "completed"];
export const DUE_FILTERS: readonly DueFilter[] = ["all", "overdue", "today", "week"];
export const SORT_MODES: readonly SortMode[] = ["default", "due_date", "created_at", "priority", "alpha"];

const INTEGER_RE = /^[+-]?\d+$/;

/** First string value of a query or form field; repeated fields keep the first. */
export function firstString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    return typeof first === "string" ? first : undefined;
  }
  return undefined;
}

function oneOf<T extends string>(allowed: readonly T[], value: string | undefined, fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

export function parsePage(value: string | undefined): number {
  if (!value || !INTEGER_RE.test(value.trim())) return 1;
  return Math.max(1, Number(value.trim()));
}

/**
 * Reads the listing parameters from a query string. Unknown values fall back
 * to their "no filter" defaults.
 */
export function parseListParams(query: Record<string, unknown>): ListParams {
  return {
    category: firstString(query.category) || "all",
    status: oneOf(STATUS_FILTERS, firstString(query.status), "all"),
    priority: firstString(query.priority) || "all",
    due: oneOf(DUE_FILTERS, firstString(query.due), "all"),
    search: (firstString(query.q) ?? "").trim(),
    sort: oneOf(SORT_MODES, firstString(query.sort), "default"),
    page: parsePage(firstString(query.page)),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function parseTaskForm(body: unknown): TaskInput {
  const fields: Record<string, unknown> = isRecord(body) ? body : {};
  return {
    title: firstString(fields.title) ?? "",
    description: firstString(fields.description),
    priority: firstString(fields.priority),
    category: firstString(fields.category),
    due_date: firstString(fields.due_date) || null,
  };
}
