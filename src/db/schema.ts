import type Database from "better-sqlite3";

const CURRENT_VERSION = 2;

const SCHEMA_V1 = `
-- Ingested news items
CREATE TABLE IF NOT EXISTS news (
    id              INTEGER PRIMARY KEY AUTOINCREMENT,
    title           TEXT NOT NULL,
    source          TEXT NOT NULL,
    url             TEXT NOT NULL UNIQUE,
    domain          TEXT NOT NULL DEFAULT 'real_estate',
    category        TEXT,
    raw_summary     TEXT,
    published_at    TEXT NOT NULL,
    tags            TEXT,
    relevance_score INTEGER,
    used_in_social  INTEGER NOT NULL DEFAULT 0,
    created_at      DATETIME DEFAULT CURRENT_TIMESTAMP
);

-- Social drafts; variants point at their primary draft
CREATE TABLE IF NOT EXISTS drafts (
    id             INTEGER PRIMARY KEY AUTOINCREMENT,
    news_id        INTEGER NOT NULL REFERENCES news(id) ON DELETE CASCADE,
    variant_of_id  INTEGER REFERENCES drafts(id) ON DELETE SET NULL,
    brand          TEXT NOT NULL,
    category       TEXT NOT NULL,
    seed           INTEGER NOT NULL,
    hook           TEXT NOT NULL,
    slides         TEXT NOT NULL,
    caption        TEXT NOT NULL,
    hashtags       TEXT NOT NULL,
    cta            TEXT NOT NULL,
    source_line    TEXT NOT NULL,
    disclaimer     TEXT NOT NULL,
    tone           TEXT NOT NULL DEFAULT 'neutral',
    language       TEXT NOT NULL DEFAULT 'es',
    status         TEXT NOT NULL DEFAULT 'DRAFT',
    created_at     DATETIME DEFAULT CURRENT_TIMESTAMP,
    updated_at     DATETIME DEFAULT CURRENT_TIMESTAMP
);

-- Schema versioning
CREATE TABLE IF NOT EXISTS schema_version (
    version     INTEGER NOT NULL,
    applied_at  DATETIME DEFAULT CURRENT_TIMESTAMP
);

-- Indexes
CREATE INDEX IF NOT EXISTS idx_news_domain ON news(domain);
CREATE INDEX IF NOT EXISTS idx_news_category ON news(category);
CREATE INDEX IF NOT EXISTS idx_drafts_news ON drafts(news_id);
CREATE INDEX IF NOT EXISTS idx_drafts_status ON drafts(status);
CREATE INDEX IF NOT EXISTS idx_drafts_variant_of ON drafts(variant_of_id);
`;

// Reviewer notes on drafts and the stored three-line brand summary of news items
const MIGRATION_V2 = `
ALTER TABLE drafts ADD COLUMN editor_notes TEXT;
ALTER TABLE news ADD COLUMN brand_summary TEXT;
`;

/**
 * Returns the current schema version from the database, or 0 if no schema exists.
 */
function getSchemaVersion(db: Database.Database): number {
  const table = db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'")
    .get();
  if (!table) return 0;
  const row = db
    .prepare("SELECT MAX(version) as version FROM schema_version")
    .get() as { version: number | null } | undefined;
  return row?.version ?? 0;
}

/**
 * Ensures the database schema is up to date.
 * Runs migrations inside a transaction. Idempotent: safe to call on every startup.
 */
export function ensureSchema(db: Database.Database): void {
  const currentVersion = getSchemaVersion(db);

  if (currentVersion >= CURRENT_VERSION) {
    return;
  }

  db.transaction(() => {
    if (currentVersion < 1) {
      db.exec(SCHEMA_V1);
      db.prepare("INSERT INTO schema_version (version) VALUES (?)").run(1);
    }
    if (currentVersion < 2) {
      db.exec(MIGRATION_V2);
      db.prepare("INSERT INTO schema_version (version) VALUES (?)").run(2);
    }
  })();
}

export { CURRENT_VERSION as SCHEMA_VERSION };
