import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import Database from 'better-sqlite3';
import logger from '../utils/logger.js';

export type SqliteDatabase = Database.Database;

// Singleton-Instanz für den Server-Prozess
let db: SqliteDatabase | null = null;

/**
 * Öffnet eine Datenbank und führt die Migrations aus.
 * `:memory:` liefert eine isolierte In-Process Datenbank (Tests, Dry-Runs).
 */
export function openDatabase(dbPath: string): SqliteDatabase {
  if (dbPath !== ':memory:') {
    const dbDir = path.dirname(dbPath);
    // Erstelle data/ Verzeichnis falls nicht existiert
    if (!fs.existsSync(dbDir)) {
      logger.info(`Erstelle Verzeichnis: ${dbDir}`);
      fs.mkdirSync(dbDir, { recursive: true });
    }
  }

  logger.debug(`Öffne SQLite Datenbank: ${dbPath}`);

  const database = new Database(dbPath, {
    verbose: process.env.NODE_ENV === 'development' ? (msg: unknown) => logger.debug(`SQL: ${String(msg)}`) : undefined,
  });

  if (dbPath !== ':memory:') {
    // WAL-Modus: Evaluator, Guard und Engine lesen parallel
    database.pragma('journal_mode = WAL');
  }
  database.pragma('synchronous = NORMAL');
  database.pragma('foreign_keys = ON');

  runMigrations(database);

  return database;
}

/**
 * Initialisiert die Prozess-Datenbank (idempotent)
 */
export function initDatabase(dbPath: string): SqliteDatabase {
  if (db) {
    return db;
  }

  logger.info(`Initialisiere SQLite Datenbank: ${dbPath}`);
  db = openDatabase(dbPath);
  logger.info('SQLite Datenbank erfolgreich initialisiert');

  return db;
}

/**
 * Findet den Schema-Pfad (funktioniert mit tsx und aus dist/)
 */
function findSchemaPath(): string {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const possiblePaths = [
    path.join(moduleDir, 'schema.sql'),
    path.resolve(process.cwd(), 'src', 'storage', 'schema.sql'),
  ];

  for (const p of possiblePaths) {
    if (fs.existsSync(p)) {
      return p;
    }
  }

  throw new Error(`Schema-Datei nicht gefunden. Geprüfte Pfade: ${possiblePaths.join(', ')}`);
}

/**
 * Führt die Schema-Migration aus.
 * Das Schema enthält Trigger (mit `;` im Body), daher läuft die Datei als Ganzes
 * in einer Transaktion. Alle Statements sind IF NOT EXISTS.
 */
function runMigrations(database: SqliteDatabase): void {
  const schema = fs.readFileSync(findSchemaPath(), 'utf-8');

  const migrate = database.transaction(() => {
    database.exec(schema);
  });
  migrate();

  logger.debug('Schema-Migration abgeschlossen');
}

/**
 * Gibt die Datenbank-Instanz zurück
 * @throws Error wenn Datenbank nicht initialisiert
 */
export function getDatabase(): SqliteDatabase {
  if (!db) {
    throw new Error('Datenbank nicht initialisiert. Rufe zuerst initDatabase() auf.');
  }
  return db;
}

/**
 * Schließt die Datenbankverbindung
 */
export function closeDatabase(): void {
  if (db) {
    logger.info('Schließe SQLite Datenbank');
    db.close();
    db = null;
  }
}

export function isDatabaseInitialized(): boolean {
  return db !== null;
}

/**
 * SQLite meldet Verletzungen von UNIQUE/PRIMARY KEY mit dieser Message
 */
export function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && err.message.includes('UNIQUE constraint failed');
}
