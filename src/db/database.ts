/**
 * Database Module - announcements ledger, run log and stats
 */

import type { Row } from '@libsql/client';
import {
  IS_TURSO,
  initDb,
  closeDb as closeAdapter,
  query,
  execute,
  executeRaw,
  int,
  text,
  type DbTarget,
  type SqlExecutor,
} from './db-adapter.js';
import { sqliteSchema } from './schema-sqlite.js';
import type { Announcement, NewAnnouncement } from '../types/index.js';

export { IS_TURSO };

let initialized = false;

/**
 * Initialize the database with schema
 */
export async function initializeDb(target?: DbTarget): Promise<void> {
  await initDb(target);
  if (initialized) return;

  try {
    await executeRaw(sqliteSchema);
  } catch (error) {
    console.error('Schema initialization failed:', error);
    throw error;
  }

  initialized = true;
}

export function closeDb(): void {
  closeAdapter();
  initialized = false;
}

// ============================================
// Row mapping
// ============================================

export function toAnnouncement(row: Row): Announcement {
  return {
    id: int(row, 'id'),
    url: text(row, 'url'),
    title: text(row, 'title'),
    publishDate: text(row, 'publish_date'),
    source: text(row, 'source'),
    category: text(row, 'category'),
    buyerName: text(row, 'buyer_name'),
    agentName: text(row, 'agent_name'),
    supplierName: text(row, 'supplier_name'),
    projectName: text(row, 'project_name'),
    bidAmount: text(row, 'bid_amount'),
    region: text(row, 'region'),
    content: text(row, 'content'),
    scrapedAt: text(row, 'scraped_at'),
    createdAt: text(row, 'created_at'),
  };
}

// ============================================
// Announcements
// ============================================

export async function getAnnouncementIdByUrl(url: string, executor?: SqlExecutor): Promise<number | null> {
  if (!url) return null;
  const rows = await query('SELECT id FROM announcements WHERE url = ? LIMIT 1', [url], executor);
  return rows.length > 0 ? int(rows[0], 'id') : null;
}

/**
 * Insert an announcement unless its URL is already stored.
 * `created` is false when another run (or an earlier stub) got there first.
 */
export async function insertAnnouncementIfAbsent(
  announcement: NewAnnouncement,
  executor?: SqlExecutor
): Promise<{ id: number; created: boolean }> {
  const result = await execute(`
    INSERT INTO announcements (
      url, title, publish_date, source, category, buyer_name, agent_name,
      supplier_name, project_name, bid_amount, region, content, scraped_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(url) DO NOTHING
  `, [
    announcement.url,
    announcement.title,
    announcement.publishDate,
    announcement.source,
    announcement.category,
    announcement.buyerName,
    announcement.agentName,
    announcement.supplierName,
    announcement.projectName,
    announcement.bidAmount,
    announcement.region,
    announcement.content,
    announcement.scrapedAt,
  ], executor);

  const id = await getAnnouncementIdByUrl(announcement.url, executor);
  if (id === null) {
    throw new Error(`Announcement row missing after insert: ${announcement.url}`);
  }
  return { id, created: result.changes > 0 };
}

export const dbHelpers = {
  getAnnouncementById: async (id: number): Promise<Announcement | null> => {
    await initializeDb();
    const rows = await query('SELECT * FROM announcements WHERE id = ?', [id]);
    return rows.length > 0 ? toAnnouncement(rows[0]) : null;
  },

  getAnnouncementByUrl: async (url: string): Promise<Announcement | null> => {
    await initializeDb();
    const rows = await query('SELECT * FROM announcements WHERE url = ?', [url]);
    return rows.length > 0 ? toAnnouncement(rows[0]) : null;
  },

  getAnnouncements: async (filters?: { q?: string; limit?: number; offset?: number }): Promise<{
    total: number;
    items: Announcement[];
  }> => {
    await initializeDb();
    let where = '';
    const params: (string | number)[] = [];

    if (filters?.q) {
      const term = `%${filters.q}%`;
      where = 'WHERE title LIKE ? OR buyer_name LIKE ? OR agent_name LIKE ? OR supplier_name LIKE ?';
      params.push(term, term, term, term);
    }

    const totalRows = await query(`SELECT COUNT(*) AS c FROM announcements ${where}`, params);
    const rows = await query(`
      SELECT * FROM announcements ${where}
      ORDER BY id DESC
      LIMIT ? OFFSET ?
    `, [...params, filters?.limit ?? 50, filters?.offset ?? 0]);

    return { total: int(totalRows[0], 'c'), items: rows.map(toAnnouncement) };
  },

  getStats: async (): Promise<{
    total_announcements: number;
    total_cards: number;
    total_card_mentions: number;
    cards_with_phone: number;
    cards_with_email: number;
    top_companies: { company: string; cards: number }[];
  }> => {
    await initializeDb();

    const count = async (sql: string) => int((await query(sql))[0], 'c');

    const topCompanies = await query(`
      SELECT company, COUNT(*) AS cards
      FROM business_cards
      WHERE company != ''
      GROUP BY company
      ORDER BY cards DESC, company
      LIMIT 20
    `);

    return {
      total_announcements: await count('SELECT COUNT(*) AS c FROM announcements'),
      total_cards: await count('SELECT COUNT(*) AS c FROM business_cards'),
      total_card_mentions: await count('SELECT COUNT(*) AS c FROM business_card_mentions'),
      cards_with_phone: await count('SELECT COUNT(DISTINCT business_card_id) AS c FROM business_card_phones'),
      cards_with_email: await count('SELECT COUNT(DISTINCT business_card_id) AS c FROM business_card_emails'),
      top_companies: topCompanies.map(row => ({ company: text(row, 'company'), cards: int(row, 'cards') })),
    };
  },
};

// ============================================
// Ingestion run log
// ============================================

export type IngestionRunStatus = 'started' | 'completed' | 'failed' | 'cancelled';

export async function logIngestionRunStart(source: string, request: unknown): Promise<number | null> {
  await initializeDb();
  const result = await execute(`
    INSERT INTO ingestion_runs (source, status, request, started_at)
    VALUES (?, 'started', ?, ?)
  `, [source, JSON.stringify(request), new Date().toISOString()]);
  return result.lastId ?? null;
}

export async function logIngestionRunEnd(
  runId: number,
  status: Exclude<IngestionRunStatus, 'started'>,
  details: unknown,
  error: string | null = null
): Promise<void> {
  await execute(`
    UPDATE ingestion_runs
    SET status = ?, details = ?, error_message = ?, completed_at = ?
    WHERE id = ?
  `, [status, JSON.stringify(details), error, new Date().toISOString(), runId]);
}

export async function getRecentIngestionRuns(limit = 20): Promise<{
  id: number;
  source: string;
  status: string;
  startedAt: string;
  completedAt: string;
  errorMessage: string;
}[]> {
  await initializeDb();
  const rows = await query('SELECT * FROM ingestion_runs ORDER BY id DESC LIMIT ?', [limit]);
  return rows.map(row => ({
    id: int(row, 'id'),
    source: text(row, 'source'),
    status: text(row, 'status'),
    startedAt: text(row, 'started_at'),
    completedAt: text(row, 'completed_at'),
    errorMessage: text(row, 'error_message'),
  }));
}

export default {
  initializeDb,
  closeDb,
  dbHelpers,
  IS_TURSO,
};
