import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { readFileSync, readdirSync, mkdirSync, existsSync } from "fs";
import { resolve, join, dirname } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import * as schema from "./schema.js";
import { logger } from "../logger.js";

const log = logger.child({ module: "db" });

const __dirname = fileURLToPath(new URL(".", import.meta.url));

export const DB_PATH = resolve(
  process.env.UNLOCKD_DB_PATH ?? join(process.cwd(), "data", "unlockd.db")
);

const MIGRATIONS_DIR = resolve(__dirname, "migrations");

const AppliedRows = z.array(z.object({ name: z.string() }));

export type Db = BetterSQLite3Database<typeof schema>;

let _db: Db | null = null;

/**
 * Returns the singleton Drizzle db instance.
 * Call initDb() at startup before using this.
 */
export function getDb(): Db {
  if (!_db) throw new Error("DB not initialized, call initDb() first");
  return _db;
}

/**
 * Opens (or creates) a SQLite database at `path` and applies pending
 * migrations. ":memory:" gives a private in-memory database.
 */
export function openDb(path: string): Db {
  if (path !== ":memory:") {
    const dataDir = dirname(path);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  const sqlite = new Database(path);
  sqlite.pragma("journal_mode = WAL");

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at INTEGER NOT NULL DEFAULT (unixepoch() * 1000)
    )
  `);

  const applied = new Set<string>(
    AppliedRows.parse(sqlite.prepare("SELECT name FROM _migrations").all()).map((r) => r.name)
  );

  const pending = readdirSync(MIGRATIONS_DIR)
    .filter((f) => f.endsWith(".sql"))
    .sort()
    .filter((f) => !applied.has(f));

  for (const file of pending) {
    const sql = readFileSync(join(MIGRATIONS_DIR, file), "utf-8");

    sqlite.transaction(() => {
      sqlite.exec(sql);
      sqlite.prepare("INSERT INTO _migrations (name) VALUES (?)").run(file);
    })();

    log.info({ migration: file }, "Applied migration");
  }

  return drizzle(sqlite, { schema });
}

/**
 * Opens the application database and runs any pending migrations.
 * Subsequent calls are no-ops.
 */
export async function initDb(): Promise<void> {
  if (_db) return;
  _db = openDb(DB_PATH);
  log.info({ path: DB_PATH }, "DB ready");
}

// Allow running directly: `tsx src/backend/db/migrate.ts`
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  await initDb();
  log.info("Migrations complete");
  process.exit(0);
}
