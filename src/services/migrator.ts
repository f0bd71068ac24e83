import fs from 'fs';
import path from 'path';
import type Database from 'better-sqlite3';
import { Logger } from '../helpers/logger';

const log = new Logger('migrator');

// Resolves the same from src/services (tests) and dist/services (production)
export const MIGRATIONS_DIR = path.join(__dirname, '..', '..', 'migrations');

interface MigrationFile {
  version: number;
  file: string;
}

/**
 * Applies numbered `.sql` files (`001_name.sql`, `002_name.sql`, ...) that
 * are not yet recorded in `schema_migrations`, lowest version first, each in
 * its own transaction. Returns how many were applied.
 */
export function runMigrations(db: Database.Database, migrationsDir: string = MIGRATIONS_DIR): number {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL
    );
  `);

  if (!fs.existsSync(migrationsDir)) {
    log.warn('No migrations directory found', { path: migrationsDir });
    return 0;
  }

  const applied = new Set(
    (db.prepare('SELECT version FROM schema_migrations').all() as { version: number }[])
      .map(r => r.version),
  );

  const pending = listMigrations(migrationsDir).filter(m => !applied.has(m.version));
  if (pending.length === 0) {
    log.debug('Schema is current', { version: Math.max(0, ...applied) });
    return 0;
  }

  const record = db.prepare<[number, string, string]>(
    'INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)',
  );

  for (const { version, file } of pending) {
    const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
    db.transaction(() => {
      db.exec(sql);
      record.run(version, file, new Date().toISOString());
    })();
    log.info('Applied migration', { version, file });
  }

  return pending.length;
}

function listMigrations(migrationsDir: string): MigrationFile[] {
  const migrations: MigrationFile[] = [];
  for (const file of fs.readdirSync(migrationsDir)) {
    if (!file.endsWith('.sql')) continue;
    const match = /^(\d+)_/.exec(file);
    if (!match) {
      log.warn('Ignoring unnumbered migration', { file });
      continue;
    }
    migrations.push({ version: parseInt(match[1], 10), file });
  }
  return migrations.sort((a, b) => a.version - b.version);
}
