import Database from "better-sqlite3";

export type SqliteDatabase = Database.Database;

export function openDatabase(dbPath: string): SqliteDatabase {
  const db = new Database(dbPath);

  if (dbPath !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("busy_timeout = 2000");

  migrate(db);
  return db;
}

export function closeDb(db: SqliteDatabase): void {
  if (db.open) {
    db.close();
  }
}

export function migrate(db: SqliteDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS servers (
      address TEXT PRIMARY KEY,
      host TEXT NOT NULL,
      port INTEGER NOT NULL,
      query_port INTEGER NOT NULL,
      name TEXT NOT NULL,
      map TEXT NOT NULL,
      country TEXT NOT NULL,
      source_kind TEXT NOT NULL,
      mods_present INTEGER NOT NULL,
      perspective TEXT NOT NULL DEFAULT 'unknown',
      player_count INTEGER NOT NULL,
      max_players INTEGER NOT NULL,
      ping_ms INTEGER,
      last_seen_at INTEGER NOT NULL,
      fetched_at INTEGER NOT NULL,
      active INTEGER NOT NULL DEFAULT 1
    );

    CREATE INDEX IF NOT EXISTS idx_servers_player_count ON servers(player_count DESC);
    CREATE INDEX IF NOT EXISTS idx_servers_ping ON servers(ping_ms);
    CREATE INDEX IF NOT EXISTS idx_servers_last_seen ON servers(last_seen_at);
    CREATE INDEX IF NOT EXISTS idx_servers_active_players ON servers(active, player_count DESC);

    CREATE TABLE IF NOT EXISTS catalog_fetches (
      criteria_key TEXT PRIMARY KEY,
      fetched_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS catalog_fetch_members (
      criteria_key TEXT NOT NULL,
      address TEXT NOT NULL,
      PRIMARY KEY (criteria_key, address)
    );
  `);

  ensureColumn(db, "servers", "perspective", "TEXT NOT NULL DEFAULT 'unknown'");
}

function ensureColumn(db: SqliteDatabase, table: string, column: string, definition: string): void {
  const columns = db.pragma(`table_info(${table})`) as Array<{ name: string }>;
  if (!columns.some((entry) => entry.name === column)) {
    db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
  }
}
