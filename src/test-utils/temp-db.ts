/**
 * A throwaway SQLite file per test file. `:memory:` is not used: libSQL hands a
 * transaction its own connection, which would see an empty in-memory database.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { closeDb, initializeDb } from '../db/database.js';
import { execute } from '../db/db-adapter.js';

export interface TempDb {
  file: string;
  reset(): Promise<void>;
  cleanup(): Promise<void>;
}

const TABLES = [
  'business_card_mentions',
  'business_card_phones',
  'business_card_emails',
  'business_cards',
  'announcements',
  'ingestion_runs',
];

export async function openTempDb(): Promise<TempDb> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tender-cards-'));
  const file = path.join(dir, 'test.db');

  closeDb();
  await initializeDb({ url: `file:${file}` });

  return {
    file,
    async reset() {
      for (const table of TABLES) {
        await execute(`DELETE FROM ${table}`);
      }
    },
    async cleanup() {
      closeDb();
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}
