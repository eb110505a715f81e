import dotenv from 'dotenv';
import { loadConfig } from '../config.js';
import { DbClient } from './db.js';

/**
 * Creates the songs table in the configured database file.
 * Existing rows are left untouched.
 */
const migrateDatabase = async (): Promise<void> => {
    dotenv.config();
    const { dbPath } = loadConfig();

    console.log('Starting database migration...');
    const db = await DbClient.connect({ filename: dbPath });
    await db.close();
    console.log(`✓ Migration complete: ${dbPath}`);
};

migrateDatabase().catch((error: unknown) => {
    console.error('Migration failed:', error);
    process.exit(1);
});
