import { describe, it, expect } from "vitest";
import type { ListParams } from "../../shared/types";
import {
  buildClauses,
  compilePlan,
  compileQueries,
  compileWhere,
  DEFAULT_LIST_PARAMS,
  escapeLike,
  MAX_PAGE,
  PAGE_SIZE,
  pageWindow,
  totalPages,
} from "./query-plan";

const TODAY = "2024-01-05";

function params(overrides: Partial<ListParams> = {}): ListParams {
  return { ...DEFAULT_LIST_PARAMS, ...overrides };
}

describe("buildClauses", () => {
  it("returns no clauses for the defaults", () => {
    expect(buildClauses(params(), TODAY)).toEqual([]);
  });

  it("maps status to the completed flag", () => {
    expect(buildClauses(params({ status: "active" }), TODAY)).toEqual([{ field: "completed", op: "=", value: 0 }]);
    expect(buildClauses(params({ status: "completed" }), TODAY)).toEqual([{ field: "completed", op: "=", value: 1 }]);
  });

  it("builds overdue as a strict comparison against today", () => {
    expect(buildClauses(params({ due: "overdue" }), TODAY)).toEqual([
      { field: "due_date", op: "is not null" },
      { field: "due_date", op: "<", value: "2024-01-05" },
    ]);
  });

  it("builds today as an equality", () => {
    expect(buildClauses(params({ due: "today" }), TODAY)).toEqual([{ field: "due_date", op: "=", value: "2024-01-05" }]);
  });

  it("builds week as an inclusive seven-day range", () => {
    expect(buildClauses(params({ due: "week" }), "2024-12-28")).toEqual([
      { field: "due_date", op: "is not null" },
      { field: "due_date", op: ">=", value: "2024-12-28" },
      { field: "due_date", op: "<=", value: "2025-01-04" },
    ]);
  });

  it("searches title or description with the trimmed text", () => {
    expect(buildClauses(params({ search: "  pay " }), TODAY)).toEqual([
      {
        op: "any",
        clauses: [
          { field: "title", op: "contains", value: "pay" },
          { field: "description", op: "contains", value: "pay" },
        ],
      },
    ]);
  });

  it("ignores a whitespace-only search", () => {
    expect(buildClauses(params({ search: "   " }), TODAY)).toEqual([]);
  });
});

describe("escapeLike", () => {
  it("escapes wildcards and the escape character", () => {
    expect(escapeLike("50%_off")).toBe("50\\%\\_off");
    expect(escapeLike("a\\b")).toBe("a\\\\b");
  });

  it("leaves plain text alone", () => {
    expect(escapeLike("pay rent")).toBe("pay rent");
  });
});

describe("compileWhere", () => {
  it("is empty without clauses", () => {
    expect(compileWhere([])).toEqual({ sql: "", params: [] });
  });

  it("joins clauses with AND and groups any() with OR", () => {
    const where = compileWhere([
      { field: "category", op: "=", value: "work" },
      {
        op: "any",
        clauses: [
          { field: "title", op: "contains", value: "50%" },
          { field: "description", op: "contains", value: "50%" },
        ],
      },
    ]);
    expect(where.sql).toBe(
      "WHERE category = ? AND (title LIKE ? ESCAPE '\\' OR description LIKE ? ESCAPE '\\')"
    );
    expect(where.params).toEqual(["work", "%50\\%%", "%50\\%%"]);
  });

  it("compiles an empty any() group to false", () => {
    expect(compileWhere([{ op: "any", clauses: [] }]).sql).toBe("WHERE 0");
  });
});

describe("compileQueries", () => {
  it("compiles the defaults", () => {
    const { rows, count } = compileQueries(compilePlan(params(), TODAY));
    expect(rows.sql).toBe("SELECT * FROM tasks ORDER BY completed ASC, created_at DESC, id DESC LIMIT ? OFFSET ?");
    expect(rows.params).toEqual([50, 0]);
    expect(count.sql).toBe("SELECT COUNT(*) AS total FROM tasks");
    expect(count.params).toEqual([]);
  });

  it("shares the WHERE text and parameters between rows and count", () => {
    const plan = compilePlan(
      params({ category: "work", status: "active", priority: "high", due: "week", search: "50%_off", page: 3 }),
      TODAY
    );
    const { rows, count } = compileQueries(plan);
    const where =
      "WHERE category = ? AND completed = ? AND priority = ? AND due_date IS NOT NULL AND due_date >= ? AND due_date <= ?" +
      " AND (title LIKE ? ESCAPE '\\' OR description LIKE ? ESCAPE '\\')";

    expect(count.sql).toBe(`SELECT COUNT(*) AS total FROM tasks ${where}`);
    expect(rows.sql).toBe(
      `SELECT * FROM tasks ${where} ORDER BY completed ASC, created_at DESC, id DESC LIMIT ? OFFSET ?`
    );
    expect(count.params).toEqual(["work", 0, "high", "2024-01-05", "2024-01-12", "%50\\%\\_off%", "%50\\%\\_off%"]);
    expect(rows.params).toEqual([...count.params, 50, 100]);
  });

  it("orders by each sort mode", () => {
    const order = (sort: ListParams["sort"]) => compilePlan(params({ sort }), TODAY).order;
    expect(order("due_date")).toEqual(["due_date ASC NULLS LAST", "created_at DESC", "id DESC"]);
    expect(order("created_at")).toEqual(["created_at DESC", "id DESC"]);
    expect(order("priority")).toEqual([
      "CASE priority WHEN 'high' THEN 1 WHEN 'medium' THEN 2 WHEN 'low' THEN 3 ELSE 4 END",
      "created_at DESC",
      "id DESC",
    ]);
    expect(order("alpha")).toEqual(["title COLLATE NOCASE ASC", "id DESC"]);
  });
});

describe("pageWindow", () => {
  it("starts at offset zero on page one", () => {
    expect(pageWindow(1)).toEqual({ limit: PAGE_SIZE, offset: 0 });
  });

  it("clamps pages below one", () => {
    expect(pageWindow(0).offset).toBe(0);
    expect(pageWindow(-3).offset).toBe(0);
    expect(pageWindow(Number.NaN).offset).toBe(0);
  });

  it("truncates fractional pages", () => {
    expect(pageWindow(2.7).offset).toBe(50);
  });

  it("caps very large pages", () => {
    expect(pageWindow(Number.MAX_VALUE).offset).toBe((MAX_PAGE - 1) * PAGE_SIZE);
  });
});

describe("totalPages", () => {
  it("rounds up partial pages", () => {
    expect(totalPages(0)).toBe(0);
    expect(totalPages(1)).toBe(1);
    expect(totalPages(50)).toBe(1);
    expect(totalPages(51)).toBe(2);
  });
});
