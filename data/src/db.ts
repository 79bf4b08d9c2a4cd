import Database from "better-sqlite3";
import path from "path";
import fs from "fs";
import { StorageError } from "../../shared/errors";
import { TASKS_TABLE } from "./query-plan";

export type TodoDb = Database.Database;

const ISO_TIMESTAMP = "'%Y-%m-%dT%H:%M:%fZ'";

const CREATE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS ${TASKS_TABLE} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    description TEXT DEFAULT '',
    priority TEXT DEFAULT 'medium',
    category TEXT DEFAULT 'personal',
    completed INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL DEFAULT (strftime(${ISO_TIMESTAMP}, 'now')),
    due_date TEXT,
    updated_at TEXT
  )
`;

/**
 * Columns later versions of the table gained. Added when the catalog says
 * they are missing; never dropped or renamed.
 */
const ADDITIVE_COLUMNS = [
  { name: "category", definition: "TEXT DEFAULT 'personal'" },
  { name: "due_date", definition: "TEXT" },
  { name: "updated_at", definition: "TEXT" },
] as const;

const INDEXED_COLUMNS = ["completed", "priority", "due_date", "category"] as const;

/** Name the table had before it became `tasks`. */
export const LEGACY_TABLE = "todos";

export interface BootstrapResult {
  createdTable: boolean;
  /** Set when an older table was renamed to `tasks`. */
  renamedFrom: string | null;
  addedColumns: string[];
}

/**
 * Opens the database file, creating its directory when needed.
 * Pass ':memory:' for an in-memory database.
 */
export function openDatabase(file: string): TodoDb {
  try {
    if (file !== ":memory:") {
      fs.mkdirSync(path.dirname(file), { recursive: true });
    }
    const db = new Database(file);
    db.pragma("journal_mode = WAL");
    db.pragma("busy_timeout = 5000");
    return db;
  } catch (err) {
    throw new StorageError(`open ${file}`, err);
  }
}

function tableExists(db: TodoDb, name: string): boolean {
  const row = db
    .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get(name);
  return row !== undefined;
}

function existingColumns(db: TodoDb): Set<string> {
  const rows = db
    .prepare<[string], { name: string }>("SELECT name FROM pragma_table_info(?)")
    .all(TASKS_TABLE);
  return new Set(rows.map((r) => r.name));
}

function normalizeTimestamps(db: TodoDb, column: "created_at" | "updated_at"): void {
  db.exec(
    `UPDATE ${TASKS_TABLE} SET ${column} = strftime(${ISO_TIMESTAMP}, ${column})
     WHERE ${column} NOT LIKE '%T%' AND strftime(${ISO_TIMESTAMP}, ${column}) IS NOT NULL`
  );
}

/**
 * Ensures the tasks table, its columns and its indexes exist. Safe to call on
 * every start, whatever version of the table is on disk.
 */
export function bootstrapSchema(db: TodoDb): BootstrapResult {
  const run = db.transaction((): BootstrapResult => {
    let renamedFrom: string | null = null;
    if (!tableExists(db, TASKS_TABLE) && tableExists(db, LEGACY_TABLE)) {
      db.exec(`ALTER TABLE ${LEGACY_TABLE} RENAME TO ${TASKS_TABLE}`);
      for (const column of INDEXED_COLUMNS) {
        db.exec(`DROP INDEX IF EXISTS idx_${LEGACY_TABLE}_${column}`);
      }
      renamedFrom = LEGACY_TABLE;
    }

    const createdTable = !tableExists(db, TASKS_TABLE);
    db.exec(CREATE_TABLE_SQL);

    const present = existingColumns(db);
    const addedColumns: string[] = [];
    for (const column of ADDITIVE_COLUMNS) {
      if (present.has(column.name)) continue;
      db.exec(`ALTER TABLE ${TASKS_TABLE} ADD COLUMN ${column.name} ${column.definition}`);
      addedColumns.push(column.name);
    }

    // Older rows carry 'YYYY-MM-DD HH:MM:SS' (UTC); store them as ISO like new rows.
    normalizeTimestamps(db, "created_at");
    // Rows written before updated_at existed start from created_at.
    db.exec(`UPDATE ${TASKS_TABLE} SET updated_at = created_at WHERE updated_at IS NULL`);
    normalizeTimestamps(db, "updated_at");

    for (const column of INDEXED_COLUMNS) {
      db.exec(`CREATE INDEX IF NOT EXISTS idx_${TASKS_TABLE}_${column} ON ${TASKS_TABLE}(${column})`);
    }

    return { createdTable, renamedFrom, addedColumns };
  });

  try {
    return run();
  } catch (err) {
    throw new StorageError("schema bootstrap", err);
  }
}
