/**
 * Database Adapter
 * Uses Turso (libSQL) if TURSO_DATABASE_URL is set, falls back to a local SQLite file.
 * Both go through the libSQL client, so the SQL is the same everywhere.
 */

import {
  createClient,
  type Client,
  type InStatement,
  type InValue,
  type ResultSet,
  type Row,
  type Transaction,
} from '@libsql/client';
import fs from 'fs';
import path from 'path';
import { loadSettings } from '../config/settings.js';

export interface DbTarget {
  url: string;
  authToken?: string;
}

/** Anything that can run a statement: the client itself or an open transaction */
export interface SqlExecutor {
  execute(stmt: InStatement): Promise<ResultSet>;
}

let useTurso = false;

export const IS_TURSO = () => useTurso;

let client: Client | null = null;

function localTarget(dbPath: string): DbTarget {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  return { url: `file:${dbPath}` };
}

/**
 * Initialize the database connection.
 * An explicit target skips environment detection (tests, scripts).
 */
export async function initDb(target?: DbTarget): Promise<Client> {
  if (client) return client;

  if (target) {
    client = createClient(target);
    useTurso = !target.url.startsWith('file:');
    return client;
  }

  const settings = loadSettings();

  if (settings.tursoUrl) {
    try {
      console.log('Attempting to use Turso...');
      const remote = createClient({
        url: settings.tursoUrl,
        authToken: settings.tursoAuthToken ?? undefined,
      });
      await remote.execute('SELECT 1');
      client = remote;
      useTurso = true;
      console.log('Using Turso successfully');
      return client;
    } catch (error) {
      console.warn('Turso connection failed, falling back to SQLite:', error);
    }
  }

  console.log(`Using SQLite at ${settings.dbPath}`);
  client = createClient(localTarget(settings.dbPath));
  useTurso = false;
  return client;
}

export async function getClient(): Promise<Client> {
  return client ?? initDb();
}

/**
 * Close database connection
 */
export function closeDb(): void {
  if (client) {
    client.close();
    client = null;
  }
}

/**
 * Execute a query and return the raw rows
 */
export async function query(
  sql: string,
  params: InValue[] = [],
  executor?: SqlExecutor
): Promise<Row[]> {
  const target = executor ?? await getClient();
  const result = await target.execute({ sql, args: params });
  return result.rows;
}

/**
 * Execute a statement (INSERT, UPDATE, DELETE)
 */
export async function execute(
  sql: string,
  params: InValue[] = [],
  executor?: SqlExecutor
): Promise<{ lastId?: number; changes: number }> {
  const target = executor ?? await getClient();
  const result = await target.execute({ sql, args: params });
  return {
    lastId: result.lastInsertRowid !== undefined ? Number(result.lastInsertRowid) : undefined,
    changes: result.rowsAffected,
  };
}

/**
 * Execute raw SQL (for schema creation, etc.)
 * Handles multiple statements separated by semicolons
 */
export async function executeRaw(sql: string): Promise<void> {
  const db = await getClient();
  await db.executeMultiple(sql);
}

/**
 * Run `fn` inside one write transaction.
 * Commits when `fn` resolves; rolls back when it throws, then rethrows.
 */
export async function withTransaction<T>(fn: (tx: Transaction) => Promise<T>): Promise<T> {
  const db = await getClient();
  const tx = await db.transaction('write');

  try {
    const result = await fn(tx);
    await tx.commit();
    return result;
  } catch (error) {
    try {
      await tx.rollback();
    } catch (rollbackError) {
      console.error('Rollback failed:', rollbackError);
    }
    throw error;
  } finally {
    tx.close();
  }
}

// Row accessors: libSQL values come back as string | number | bigint | ArrayBuffer | null

export function text(row: Row, column: string): string {
  const value = row[column];
  return value === null || value === undefined ? '' : String(value);
}

export function int(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string') return parseInt(value, 10) || 0;
  return 0;
}

export default {
  IS_TURSO,
  initDb,
  getClient,
  closeDb,
  query,
  execute,
  executeRaw,
  withTransaction,
};
