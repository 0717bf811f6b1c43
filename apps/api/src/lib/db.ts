import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from '@dentdesk/shared/schemas/db/index.js';

export type ClinicDatabase = BetterSQLite3Database<typeof schema>;

/** The handle passed to a `db.transaction()` callback. */
export type ClinicTransaction = Parameters<Parameters<ClinicDatabase['transaction']>[0]>[0];

/** SQL function registered on every connection: full Unicode lowercase. */
export const UNICODE_LOWER = 'unicode_lower';

export interface DatabaseHandle {
  db: ClinicDatabase;
  close(): void;
}

// ---------------------------------------------------------------------------
// Bootstrap DDL
// ---------------------------------------------------------------------------
// Tables are created on first start when absent. There is no migration step:
// column changes need manual intervention on the SQLite file.

const BOOTSTRAP_DDL = `
CREATE TABLE IF NOT EXISTS patients (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  patient_name TEXT NOT NULL,
  phone_number TEXT NOT NULL UNIQUE,
  treatment_type TEXT,
  teeth_location TEXT
);
CREATE INDEX IF NOT EXISTS idx_phone ON patients (phone_number);

CREATE TABLE IF NOT EXISTS appointments (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  appointment_date TEXT NOT NULL,
  treatment_type TEXT NOT NULL,
  dentist TEXT NOT NULL,
  fee REAL CHECK (fee IS NULL OR fee >= 0),
  notes TEXT,
  patient_id INTEGER NOT NULL REFERENCES patients (id) ON DELETE CASCADE
);
CREATE INDEX IF NOT EXISTS idx_appointments_date ON appointments (appointment_date);
CREATE INDEX IF NOT EXISTS idx_appointments_patient ON appointments (patient_id);
`;

/**
 * Opens (or creates) the clinic database file and ensures the schema exists.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(filename: string): DatabaseHandle {
  const sqlite = new Database(filename);
  if (filename !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('foreign_keys = ON');
  // SQLite's built-in lower() only folds A-Z.
  sqlite.function(UNICODE_LOWER, { deterministic: true }, (value: unknown) =>
    typeof value === 'string' ? value.toLowerCase() : value,
  );
  sqlite.exec(BOOTSTRAP_DDL);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
