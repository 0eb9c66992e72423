/**
 * Database Initialization Script
 * Creates the SQLite database and runs migrations
 *
 * Usage: npx tsx scripts/init_db.ts
 */

import './load_env';
import { initializeDatabase, closeDatabase } from '../src/data/db';

console.log('Initializing database...');

try {
  const db = initializeDatabase();
  const tables = db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .all()
    .map((row) => row.name);
  console.log('Database initialized successfully');
  console.log('Location:', db.name);
  console.log('Tables:', tables.join(', '));
  closeDatabase();
} catch (error) {
  console.error('Database initialization failed:', error);
  process.exit(1);
}
