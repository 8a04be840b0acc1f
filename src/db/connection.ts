import Database from "better-sqlite3";

/**
 * Opens (or creates) a SQLite database at the given path.
 * Enables WAL mode and foreign keys. Uses `:memory:` for testing.
 */
export function openDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath);

  db.pragma("journal_mode = WAL");
  // Drafts cascade with their news item
  db.pragma("foreign_keys = ON");

  return db;
}
