/**
 * Turso/libSQL Schema for the announcement ledger and business-card directory
 * Note: Turso uses SQLite syntax
 */

export const sqliteSchema = `
-- Announcements (detail pages). url is the dedup ledger key.
CREATE TABLE IF NOT EXISTS announcements (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  url TEXT NOT NULL UNIQUE,
  title TEXT NOT NULL,
  publish_date TEXT,
  source TEXT,
  category TEXT,
  buyer_name TEXT,
  agent_name TEXT,
  supplier_name TEXT,
  project_name TEXT,
  bid_amount TEXT,
  region TEXT,
  content TEXT,
  scraped_at TEXT,
  created_at TEXT DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_announcements_publish_date ON announcements(publish_date);
CREATE INDEX IF NOT EXISTS idx_announcements_buyer ON announcements(buyer_name);

-- Business cards: one per (company, contact person)
CREATE TABLE IF NOT EXISTS business_cards (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  company TEXT NOT NULL,
  contact_name TEXT NOT NULL DEFAULT '',
  created_at TEXT DEFAULT CURRENT_TIMESTAMP,
  updated_at TEXT DEFAULT CURRENT_TIMESTAMP,
  UNIQUE(company, contact_name)
);

CREATE INDEX IF NOT EXISTS idx_business_cards_company ON business_cards(company);

-- Phone and email sets. Rows are only ever added, which keeps both sets monotonic.
CREATE TABLE IF NOT EXISTS business_card_phones (
  business_card_id INTEGER NOT NULL REFERENCES business_cards(id),
  phone TEXT NOT NULL,
  created_at TEXT DEFAULT CURRENT_TIMESTAMP,
  PRIMARY KEY (business_card_id, phone)
);

CREATE TABLE IF NOT EXISTS business_card_emails (
  business_card_id INTEGER NOT NULL REFERENCES business_cards(id),
  email TEXT NOT NULL,
  created_at TEXT DEFAULT CURRENT_TIMESTAMP,
  PRIMARY KEY (business_card_id, email)
);

-- Provenance: which announcement credited which card, in which role
CREATE TABLE IF NOT EXISTS business_card_mentions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  business_card_id INTEGER NOT NULL REFERENCES business_cards(id),
  announcement_id INTEGER NOT NULL REFERENCES announcements(id),
  role TEXT NOT NULL,
  created_at TEXT DEFAULT CURRENT_TIMESTAMP,
  UNIQUE(business_card_id, announcement_id, role)
);

CREATE INDEX IF NOT EXISTS idx_card_mentions_announcement ON business_card_mentions(announcement_id);

-- Crawl run log
CREATE TABLE IF NOT EXISTS ingestion_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  source TEXT NOT NULL,
  status TEXT NOT NULL,
  request TEXT,
  details TEXT,
  error_message TEXT,
  started_at TEXT DEFAULT CURRENT_TIMESTAMP,
  completed_at TEXT
);
`;
