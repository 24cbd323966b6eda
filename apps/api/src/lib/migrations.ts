import type Database from 'better-sqlite3';

type Migration = { version: number; name: string; up: string[] };

const migrations: Migration[] = [
  {
    version: 1,
    name: 'init_ledger_tables',
    up: [
      `CREATE TABLE IF NOT EXISTS accounts (
        user_id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        product TEXT NULL,
        all_time_received INTEGER NOT NULL DEFAULT 0 CHECK (all_time_received >= 0),
        all_time_given INTEGER NOT NULL DEFAULT 0 CHECK (all_time_given >= 0),
        daily_received INTEGER NOT NULL DEFAULT 0 CHECK (daily_received >= 0),
        daily_given INTEGER NOT NULL DEFAULT 0 CHECK (daily_given >= 0),
        weekly_received INTEGER NOT NULL DEFAULT 0 CHECK (weekly_received >= 0),
        weekly_given INTEGER NOT NULL DEFAULT 0 CHECK (weekly_given >= 0),
        monthly_received INTEGER NOT NULL DEFAULT 0 CHECK (monthly_received >= 0),
        monthly_given INTEGER NOT NULL DEFAULT 0 CHECK (monthly_given >= 0),
        last_daily_reset TEXT NULL, -- YYYY-MM-DD
        last_weekly_reset TEXT NULL,
        last_monthly_reset TEXT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );`,

      `CREATE TABLE IF NOT EXISTS pending_transfers (
        id TEXT PRIMARY KEY,
        recipient_id TEXT NOT NULL REFERENCES accounts(user_id) ON DELETE CASCADE,
        sender_id TEXT NOT NULL REFERENCES accounts(user_id) ON DELETE CASCADE,
        sender_name TEXT NOT NULL,
        amount INTEGER NOT NULL CHECK (amount > 0),
        note TEXT NULL,
        created_at TEXT NOT NULL
      );`,

      `CREATE INDEX IF NOT EXISTS idx_pending_transfers_recipient ON pending_transfers(recipient_id);`,
      `CREATE INDEX IF NOT EXISTS idx_pending_transfers_sender ON pending_transfers(sender_id);`,
      `CREATE INDEX IF NOT EXISTS idx_pending_transfers_created ON pending_transfers(created_at);`,

      `CREATE TABLE IF NOT EXISTS activities (
        id TEXT PRIMARY KEY,
        user_id TEXT NULL REFERENCES accounts(user_id) ON DELETE SET NULL,
        message TEXT NOT NULL,
        created_at TEXT NOT NULL
      );`,

      `CREATE INDEX IF NOT EXISTS idx_activities_created ON activities(created_at DESC);`,
      `CREATE INDEX IF NOT EXISTS idx_activities_user ON activities(user_id);`,
    ],
  },
];

export function ensureMigrations(db: Database.Database): number[] {
  db.exec(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL
    );`
  );

  const applied = db.prepare<[], { version: number }>(`SELECT version FROM schema_migrations;`).all();
  const appliedSet = new Set<number>(applied.map((r) => r.version));
  const record = db.prepare<[number, string, string]>(
    `INSERT INTO schema_migrations(version, name, applied_at) VALUES(?, ?, ?);`
  );

  const newlyApplied: number[] = [];
  for (const m of migrations) {
    if (appliedSet.has(m.version)) continue;
    db.transaction(() => {
      for (const stmt of m.up) {
        db.exec(stmt);
      }
      record.run(m.version, m.name, new Date().toISOString());
    })();
    newlyApplied.push(m.version);
  }
  return newlyApplied;
}
