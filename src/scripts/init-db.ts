import { Database } from '../services/database.js';
import fs from 'node:fs';
import path from 'node:path';

const DB_PATH = process.env.DATABASE_PATH || './data/tracker.db';

function initDatabase(): void {
  console.log('Initializing database...');

  const dataDir = path.dirname(DB_PATH);
  if (!fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true });
    console.log(`Created data directory: ${dataDir}`);
  }

  const db = new Database(DB_PATH);
  console.log(`Database ready at: ${DB_PATH}`);

  db.close();
  console.log('Database initialization complete.');
}

initDatabase();
