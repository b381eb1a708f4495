/**
 * Card Resolution Module
 * Merges contact mentions into the business_cards directory keyed by (company, contact person),
 * and records which announcement credited which card.
 */

import type { Row } from '@libsql/client';
import { query, execute, withTransaction, int, text, type SqlExecutor } from '../db/db-adapter.js';
import { initializeDb, insertAnnouncementIfAbsent, dbHelpers } from '../db/database.js';
import { cleanCompany } from '../extractor/cleaner.js';
import { extractContacts } from '../extractor/contact-extractor.js';
import { findExpertNames } from '../scraper/detail-parser.js';
import { StoreError } from '../types/errors.js';
import {
  isContactRole,
  type Announcement,
  type BusinessCard,
  type CardMentionDetail,
  type CardMergeOutcome,
  type CompanyRole,
  type ContactMention,
  type NewAnnouncement,
} from '../types/index.js';

// =====================================================
// Types
// =====================================================

export type AnnouncementParties = Pick<Announcement, 'buyerName' | 'agentName' | 'supplierName'>;

export interface CardKey {
  company: string;
  contactName: string;
}

export interface IngestResult {
  announcementId: number;
  /** false when the URL was already stored; nothing is merged then */
  created: boolean;
  mentions: number;
  outcomes: CardMergeOutcome[];
  unattributed: number;
}

const COMPANY_FIELD: Record<CompanyRole, keyof AnnouncementParties> = {
  buyer: 'buyerName',
  agent: 'agentName',
  supplier: 'supplierName',
};

// =====================================================
// Key resolution
// =====================================================

export function normalizeCompanyName(name: string): string {
  return cleanCompany(name).replace(/\s+/g, ' ');
}

export function normalizeContactName(name: string): string {
  return name.replace(/\s+/g, '');
}

/**
 * Card key for a mention. The company comes from the announcement's structured
 * party fields, never from free text; a `contact` mention uses the company role
 * that preceded it on the page. Returns null for (empty, empty).
 */
export function resolveCardKey(parties: AnnouncementParties, mention: ContactMention): CardKey | null {
  const companyRole = mention.role === 'contact' ? mention.companyRole : mention.role;
  const company = companyRole ? normalizeCompanyName(parties[COMPANY_FIELD[companyRole]]) : '';
  const contactName = normalizeContactName(mention.name);

  if (!company && !contactName) return null;
  return { company, contactName };
}

// =====================================================
// Merge
// =====================================================

/**
 * Create-or-union one card and link it to the announcement, inside `tx`.
 */
export async function mergeMentionTx(
  tx: SqlExecutor,
  announcementId: number,
  parties: AnnouncementParties,
  mention: ContactMention
): Promise<CardMergeOutcome | null> {
  const key = resolveCardKey(parties, mention);
  if (!key) return null;

  const now = new Date().toISOString();

  const insert = await execute(`
    INSERT INTO business_cards (company, contact_name, created_at, updated_at)
    VALUES (?, ?, ?, ?)
    ON CONFLICT(company, contact_name) DO NOTHING
  `, [key.company, key.contactName, now, now], tx);

  const rows = await query(
    'SELECT id FROM business_cards WHERE company = ? AND contact_name = ?',
    [key.company, key.contactName],
    tx
  );
  if (rows.length === 0) {
    throw new Error(`Card row missing after upsert: ${key.company}/${key.contactName}`);
  }
  const cardId = int(rows[0], 'id');

  let phonesAdded = 0;
  for (const phone of mention.phones) {
    const result = await execute(
      'INSERT OR IGNORE INTO business_card_phones (business_card_id, phone, created_at) VALUES (?, ?, ?)',
      [cardId, phone, now],
      tx
    );
    phonesAdded += result.changes;
  }

  let emailsAdded = 0;
  for (const email of mention.emails) {
    const result = await execute(
      'INSERT OR IGNORE INTO business_card_emails (business_card_id, email, created_at) VALUES (?, ?, ?)',
      [cardId, email, now],
      tx
    );
    emailsAdded += result.changes;
  }

  const link = await execute(`
    INSERT OR IGNORE INTO business_card_mentions (business_card_id, announcement_id, role, created_at)
    VALUES (?, ?, ?, ?)
  `, [cardId, announcementId, mention.role, now], tx);

  await execute('UPDATE business_cards SET updated_at = ? WHERE id = ?', [now, cardId], tx);

  return {
    cardId,
    company: key.company,
    contactName: key.contactName,
    role: mention.role,
    created: insert.changes > 0,
    phonesAdded,
    emailsAdded,
    mentionLinked: link.changes > 0,
  };
}

async function mergeAll(
  tx: SqlExecutor,
  announcementId: number,
  parties: AnnouncementParties,
  mentions: ContactMention[]
): Promise<{ outcomes: CardMergeOutcome[]; unattributed: number }> {
  const outcomes: CardMergeOutcome[] = [];
  let unattributed = 0;

  for (const mention of mentions) {
    const outcome = await mergeMentionTx(tx, announcementId, parties, mention);
    if (outcome) outcomes.push(outcome);
    else unattributed++;
  }

  return { outcomes, unattributed };
}

/**
 * Store a new announcement and merge all of its mentions in one transaction.
 * An announcement whose URL is already stored is left as it is.
 */
export async function ingestAnnouncement(
  announcement: NewAnnouncement,
  mentions: ContactMention[]
): Promise<IngestResult> {
  await initializeDb();

  try {
    return await withTransaction(async tx => {
      const { id, created } = await insertAnnouncementIfAbsent(announcement, tx);
      if (!created) {
        return { announcementId: id, created, mentions: mentions.length, outcomes: [], unattributed: 0 };
      }

      const merged = await mergeAll(tx, id, announcement, mentions);
      return { announcementId: id, created, mentions: mentions.length, ...merged };
    });
  } catch (error) {
    throw new StoreError(`Failed to store announcement ${announcement.url}`, error);
  }
}

/**
 * Re-extract contacts from a stored announcement and merge them again.
 * Merging is idempotent, so repeated runs only add what is new.
 */
export async function reprocessAnnouncement(
  url: string,
  options: { lookbackChars?: number } = {}
): Promise<IngestResult | null> {
  const announcement = await dbHelpers.getAnnouncementByUrl(url);
  if (!announcement) return null;

  const mentions = extractContacts(announcement.content, {
    lookbackChars: options.lookbackChars,
    excludedNames: findExpertNames(announcement.content),
  });

  try {
    const merged = await withTransaction(tx => mergeAll(tx, announcement.id, announcement, mentions));
    return { announcementId: announcement.id, created: false, mentions: mentions.length, ...merged };
  } catch (error) {
    throw new StoreError(`Failed to reprocess announcement ${url}`, error);
  }
}

// =====================================================
// Queries
// =====================================================

const CARD_COLUMNS = `
  c.id, c.company, c.contact_name, c.created_at, c.updated_at,
  (SELECT COUNT(DISTINCT m.announcement_id) FROM business_card_mentions m WHERE m.business_card_id = c.id)
    AS announcement_count
`;

async function loadCards(rows: Row[]): Promise<BusinessCard[]> {
  const cards: BusinessCard[] = [];

  for (const row of rows) {
    const id = int(row, 'id');
    const phones = await query(
      'SELECT phone FROM business_card_phones WHERE business_card_id = ? ORDER BY rowid',
      [id]
    );
    const emails = await query(
      'SELECT email FROM business_card_emails WHERE business_card_id = ? ORDER BY rowid',
      [id]
    );

    cards.push({
      id,
      company: text(row, 'company'),
      contactName: text(row, 'contact_name'),
      phones: phones.map(r => text(r, 'phone')),
      emails: emails.map(r => text(r, 'email')),
      announcementCount: int(row, 'announcement_count'),
      createdAt: text(row, 'created_at'),
      updatedAt: text(row, 'updated_at'),
    });
  }

  return cards;
}

/** `%value%` with LIKE wildcards in `value` taken literally (pair with ESCAPE '\') */
function containsPattern(value: string): string {
  return `%${value.replace(/[\\%_]/g, '\\$&')}%`;
}

/**
 * Cards for a company: exact match, or substring match with `like`
 */
export async function findCards(
  company: string,
  options: { like?: boolean; limit?: number } = {}
): Promise<BusinessCard[]> {
  await initializeDb();

  const rows = await query(`
    SELECT ${CARD_COLUMNS}
    FROM business_cards c
    WHERE c.company ${options.like ? "LIKE ? ESCAPE '\\'" : '= ?'}
    ORDER BY c.updated_at DESC, c.id
    LIMIT ?
  `, [options.like ? containsPattern(company) : company, options.limit ?? 50]);

  return loadCards(rows);
}

export async function getCard(id: number): Promise<BusinessCard | null> {
  await initializeDb();
  const rows = await query(`SELECT ${CARD_COLUMNS} FROM business_cards c WHERE c.id = ?`, [id]);
  const cards = await loadCards(rows);
  return cards[0] ?? null;
}

/**
 * Substring search over company and contact name; an empty query lists every card
 */
export async function searchCards(
  q: string,
  options: { limit?: number; offset?: number } = {}
): Promise<{ total: number; items: BusinessCard[] }> {
  await initializeDb();

  const term = containsPattern(q.trim());
  const where = q.trim() ? "WHERE c.company LIKE ? ESCAPE '\\' OR c.contact_name LIKE ? ESCAPE '\\'" : '';
  const params = q.trim() ? [term, term] : [];

  const totalRows = await query(`SELECT COUNT(*) AS c FROM business_cards c ${where}`, params);
  const rows = await query(`
    SELECT ${CARD_COLUMNS}
    FROM business_cards c
    ${where}
    ORDER BY c.updated_at DESC, c.id
    LIMIT ? OFFSET ?
  `, [...params, options.limit ?? 50, options.offset ?? 0]);

  return { total: int(totalRows[0], 'c'), items: await loadCards(rows) };
}

/**
 * Announcements that credited a card
 */
export async function listCardMentions(cardId: number): Promise<CardMentionDetail[]> {
  await initializeDb();

  const rows = await query(`
    SELECT m.announcement_id, m.role, a.title, a.url, a.publish_date
    FROM business_card_mentions m
    JOIN announcements a ON a.id = m.announcement_id
    WHERE m.business_card_id = ?
    ORDER BY a.publish_date DESC, m.id
  `, [cardId]);

  return rows.flatMap(row => {
    const role = text(row, 'role');
    if (!isContactRole(role)) return [];
    return [{
      announcementId: int(row, 'announcement_id'),
      title: text(row, 'title'),
      url: text(row, 'url'),
      publishDate: text(row, 'publish_date'),
      role,
    }];
  });
}

export default {
  resolveCardKey,
  ingestAnnouncement,
  reprocessAnnouncement,
  findCards,
  getCard,
  searchCards,
  listCardMentions,
};
