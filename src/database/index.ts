import Database from 'better-sqlite3';
import { getConfig } from '../config';
import logger from '../utils/logger';

// Initialize database connection
let db: Database.Database;
const dbFilePath = getConfig().dbPath;

try {
  db = new Database(dbFilePath);
  // SQLite leaves foreign keys off unless asked; token cleanup relies on ON DELETE CASCADE.
  db.pragma('foreign_keys = ON');
  logger.info(`Connected to the SQLite database (${dbFilePath}).`);
} catch (error) {
  logger.error('Error connecting to the database:', error);
  process.exit(1); // Exiting if DB connection is critical
}

// Function to initialize the database schema
function initializeSchema(): void {
  try {
    db.exec(`
      CREATE TABLE IF NOT EXISTS users (
        id TEXT PRIMARY KEY,
        email TEXT UNIQUE NOT NULL,
        passwordHash TEXT NOT NULL,
        firstName TEXT NOT NULL DEFAULT '',
        lastName TEXT NOT NULL DEFAULT '',
        role TEXT NOT NULL DEFAULT 'BUYER',
        createdAt INTEGER,
        updatedAt INTEGER
      );
    `);

    db.exec('CREATE INDEX IF NOT EXISTS idx_users_email ON users (email);');

    db.exec(`
      CREATE TABLE IF NOT EXISTS tokens (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id TEXT NOT NULL,
        token TEXT UNIQUE NOT NULL,
        token_type TEXT NOT NULL CHECK (token_type IN ('ACCESS', 'REFRESH')),
        revoked INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER,
        FOREIGN KEY(user_id) REFERENCES users(id) ON DELETE CASCADE
      );
    `);

    db.exec('CREATE INDEX IF NOT EXISTS idx_tokens_user_id ON tokens (user_id);');
    db.exec('CREATE INDEX IF NOT EXISTS idx_tokens_user_id_type_revoked ON tokens (user_id, token_type, revoked);');

    logger.info('Database schema initialized successfully.');
  } catch (error) {
    logger.error('Error initializing database schema:', error);
    process.exit(1); // Exiting if schema initialization is critical
  }
}

// Call initializeSchema after the database connection is established
initializeSchema();

// True for a write rejected by a UNIQUE or PRIMARY KEY constraint.
// Matched on the driver's error code: the native addon binds SqliteError once per process,
// so a class check fails for a module loaded from a second registry.
function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
  );
}

// Runs `work` inside a single transaction; nested calls become savepoints.
function runInTransaction<T>(work: () => T): T {
  return db.transaction(work)();
}

export { db, initializeSchema, isUniqueViolation, runInTransaction };
