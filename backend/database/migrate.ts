/**
 * Schema Migration
 *
 * Applies schema.sql and seeds the badge catalog.
 *
 * Usage: tsx backend/database/migrate.ts
 */

import * as fs from 'fs';
import * as path from 'path';
import { config } from '../src/config';
import { createDatabase } from '../src/db';
import { dbLogger } from '../src/logger';
import { BadgeRepository } from '../src/repositories';
import { BADGE_CATALOG } from '../src/services/BadgeEngine';

async function migrate(): Promise<void> {
  if (!config.database.url) {
    throw new Error('DATABASE_URL is required');
  }

  const schemaPath = path.join(__dirname, 'schema.sql');
  const schemaSQL = fs.readFileSync(schemaPath, 'utf-8');
  const db = createDatabase(config.database);

  try {
    // Multiple statements, no parameters: pg sends this as one simple query.
    await db.query(schemaSQL);
    dbLogger.info({ file: schemaPath }, 'Schema applied');

    const seeded = await new BadgeRepository(db).upsertDefinitions(BADGE_CATALOG);
    dbLogger.info({ badges: seeded }, 'Badge catalog seeded');
  } finally {
    await db.close();
  }
}

migrate().catch((err: unknown) => {
  dbLogger.fatal({ err }, 'Migration failed');
  process.exit(1);
});
