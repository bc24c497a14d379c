import { readFileSync, readdirSync } from "fs";
import { fileURLToPath } from "url";
import Database from "better-sqlite3";

export type DB = Database.Database;

const migrationsDir = fileURLToPath(new URL("./migrations/", import.meta.url));

/** Open a DB or accept an existing connection; apply migrations. */
export function openDb(dbOrPath: DB | string): DB {
  const db = typeof dbOrPath === "string" ? new Database(dbOrPath) : dbOrPath;
  if (db.memory === false) db.pragma("journal_mode = WAL");
  applyMigrations(db);
  return db;
}

function applyMigrations(db: DB): void {
  db.exec(`CREATE TABLE IF NOT EXISTS schema_migrations (name TEXT PRIMARY KEY, applied_at TEXT NOT NULL)`);
  const applied = new Set(
    db
      .prepare<[], { name: string }>(`SELECT name FROM schema_migrations`)
      .all()
      .map(row => row.name),
  );
  const record = db.prepare<[string, string]>(`INSERT INTO schema_migrations (name, applied_at) VALUES (?, ?)`);
  const files = readdirSync(migrationsDir)
    .filter(f => f.endsWith(".sql"))
    .sort();
  for (const file of files) {
    if (applied.has(file)) continue;
    const sql = readFileSync(migrationsDir + file, "utf8");
    db.transaction(() => {
      db.exec(sql);
      record.run(file, new Date().toISOString());
    })();
  }
}
