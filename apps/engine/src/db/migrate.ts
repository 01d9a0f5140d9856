import 'dotenv/config';
import { readFile } from 'fs/promises';
import path from 'path';
import { createPool } from './index';

const TAG = '[migrate]';
const SCHEMA_PATH = path.resolve(__dirname, '../../db/schema.sql');

async function migrate(): Promise<void> {
    const pool = createPool();
    try {
        const sql = await readFile(SCHEMA_PATH, 'utf-8');
        await pool.query(sql);
        console.log(`${TAG} applied ${SCHEMA_PATH}`);
    } finally {
        await pool.end();
    }
}

migrate().catch((err) => {
    console.error(`${TAG} failed:`, err);
    process.exit(1);
});
