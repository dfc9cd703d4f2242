#!/usr/bin/env tsx
/**
 * Empties the RAG tables.
 * Usage: npm run db:clear
 */

import { Pool } from 'pg';
import { config } from 'dotenv';
import { resolve } from 'node:path';

config({ path: resolve(process.cwd(), '.env.local') });
config({ path: resolve(process.cwd(), '.env') });

const TABLES = ['rag_conversation_turns', 'rag_chunks', 'rag_documents'];

const DATABASE_URL = process.env.DATABASE_URL;

if (!DATABASE_URL) {
  console.error('❌ DATABASE_URL is not set');
  process.exit(1);
}

const pool = new Pool({
  connectionString: DATABASE_URL,
});

async function countRows(table: string): Promise<number> {
  const { rows } = await pool.query<{ count: string }>(
    `SELECT COUNT(*) AS count FROM ${table}`,
  );
  return Number.parseInt(rows[0]?.count ?? '0', 10);
}

async function clearTables() {
  const client = await pool.connect();
  try {
    console.log('📊 Current row counts:');
    let total = 0;
    for (const table of TABLES) {
      const count = await countRows(table);
      total += count;
      console.log(`   - ${table}: ${count}`);
    }

    if (total === 0) {
      console.log('✅ Tables are already empty');
      return;
    }

    await client.query('BEGIN');
    try {
      // children first, so the order does not depend on ON DELETE CASCADE
      for (const table of TABLES) {
        await client.query(`DELETE FROM ${table}`);
        console.log(`✅ Cleared ${table}`);
      }
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    }
  } finally {
    client.release();
    await pool.end();
  }
}

clearTables().catch((error) => {
  console.error('❌ Failed to clear tables:', error);
  process.exit(1);
});
