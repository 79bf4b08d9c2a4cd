import type { ListParams } from "../../shared/types";

/** Listing URL for `params`, leaving out parameters at their defaults. */
export function listHref(params: ListParams, page: number = params.page): string {
  const search = new URLSearchParams();
  if (params.category !== "all") search.set("category", params.category);
  if (params.search) search.set("q", params.search);
  if (params.status !== "all") search.set("status", params.status);
  if (params.priority !== "all") search.set("priority", params.priority);
  if (params.due !== "all") search.set("due", params.due);
  if (params.sort !== "default") search.set("sort", params.sort);
  if (page > 1) search.set("page", String(page));
  const text = search.toString();
  return text ? `/?${text}` : "/";
}
