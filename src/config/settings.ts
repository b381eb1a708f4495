/**
 * Runtime settings, read from the environment.
 * Entry points load .env.local / .env through dotenv before calling loadSettings().
 */

import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DATA_DIR = path.join(__dirname, '../../data');

export type FetchMode = 'http' | 'browser';

export interface Settings {
  tursoUrl: string | null;
  tursoAuthToken: string | null;
  dbPath: string;
  fetchMode: FetchMode;
  chromePath: string;
  userAgent: string;
  fetchTimeoutMs: number;
  fetchRetries: number;
  retryDelayMs: number;
  pageDelay: DelayRange;
  detailDelay: DelayRange;
  maxPages: number;
  lookbackChars: number;
  keywordFile: string;
  port: number;
}

export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = parseInt(raw, 10);
  if (isNaN(value) || value < min) {
    console.warn(`Ignoring invalid ${name}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

function readRange(env: NodeJS.ProcessEnv, prefix: string, fallback: DelayRange): DelayRange {
  const minMs = readInt(env, `${prefix}_MIN_MS`, fallback.minMs);
  const maxMs = readInt(env, `${prefix}_MAX_MS`, fallback.maxMs);
  return maxMs < minMs ? { minMs, maxMs: minMs } : { minMs, maxMs };
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const fetchMode = env.FETCH_MODE === 'browser' ? 'browser' : 'http';

  return {
    tursoUrl: env.TURSO_DATABASE_URL || null,
    tursoAuthToken: env.TURSO_AUTH_TOKEN || null,
    dbPath: env.DB_PATH ? path.resolve(env.DB_PATH) : path.join(DATA_DIR, 'announcements.db'),
    fetchMode,
    chromePath: env.CHROME_PATH || '/usr/bin/google-chrome',
    userAgent: env.USER_AGENT || DEFAULT_USER_AGENT,
    fetchTimeoutMs: readInt(env, 'FETCH_TIMEOUT_MS', 30000, 1),
    fetchRetries: readInt(env, 'FETCH_RETRIES', 2),
    retryDelayMs: readInt(env, 'RETRY_DELAY_MS', 1000),
    pageDelay: readRange(env, 'PAGE_DELAY', { minMs: 2000, maxMs: 5000 }),
    detailDelay: readRange(env, 'DETAIL_DELAY', { minMs: 1000, maxMs: 3000 }),
    maxPages: readInt(env, 'MAX_PAGES', 3, 1),
    lookbackChars: readInt(env, 'CONTACT_LOOKBACK_CHARS', 80, 1),
    keywordFile: env.KEYWORD_FILE ? path.resolve(env.KEYWORD_FILE) : path.join(DATA_DIR, 'keywords.txt'),
    port: readInt(env, 'PORT', 3001, 1),
  };
}
