// Types for the procurement announcement crawler and business-card directory

export const CONTACT_ROLES = ['buyer', 'agent', 'supplier', 'contact'] as const;

export type ContactRole = typeof CONTACT_ROLES[number];

/** Roles whose company is named by a structured field on the announcement */
export type CompanyRole = Exclude<ContactRole, 'contact'>;

export function isContactRole(value: string): value is ContactRole {
  return (CONTACT_ROLES as readonly string[]).includes(value);
}

export interface AnnouncementStub {
  title: string;
  url: string;
  publishDate: string;
  buyerName: string;
  agentName: string;
}

export interface Announcement {
  id: number;
  url: string;
  title: string;
  publishDate: string;
  source: string;
  category: string;
  buyerName: string;
  agentName: string;
  supplierName: string;
  projectName: string;
  bidAmount: string;
  region: string;
  content: string;
  scrapedAt: string;
  createdAt: string;
}

export type NewAnnouncement = Omit<Announcement, 'id' | 'createdAt'>;

export interface TextSpan {
  start: number;
  end: number;
  excerpt: string;
}

export interface ContactMention {
  role: ContactRole;
  name: string;
  phones: string[];
  emails: string[];
  /** For `contact` mentions: the company-bearing role preceding it on the page */
  companyRole: CompanyRole | null;
  span: TextSpan;
}

export interface BusinessCard {
  id: number;
  company: string;
  contactName: string;
  phones: string[];
  emails: string[];
  announcementCount: number;
  createdAt: string;
  updatedAt: string;
}

export interface CardMentionDetail {
  announcementId: number;
  title: string;
  url: string;
  publishDate: string;
  role: ContactRole;
}

// Search filter types
export const SEARCH_MODES = ['fulltext', 'title'] as const;
export type SearchMode = typeof SEARCH_MODES[number];

export const PIN_MU_VALUES = ['all', 'goods', 'engineering', 'services'] as const;
export type PinMu = typeof PIN_MU_VALUES[number];

export const BID_SORT_VALUES = ['all', 'central', 'local'] as const;
export type BidSort = typeof BID_SORT_VALUES[number];

export const TIME_PRESETS = ['today', '3days', '1week', '1month', '3months', 'halfyear'] as const;
export type TimePreset = typeof TIME_PRESETS[number];

export type TimeWindow =
  | { kind: 'preset'; preset: TimePreset }
  | { kind: 'range'; start: string; end: string };

export interface SearchFilters {
  keywords: string[];
  searchMode: SearchMode;
  pinMu: PinMu;
  bidSort: BidSort;
  /** 0 = all announcement types, 1-12 per the portal's bidType codes */
  bidType: number;
  timeWindow: TimeWindow;
  maxPages: number;
}

export type KeywordQuery = Omit<SearchFilters, 'keywords' | 'maxPages'> & { keyword: string };

export type KeywordOutcome = 'exhausted' | 'throttled' | 'page_cap' | 'failed' | 'cancelled';

export interface CardMergeOutcome {
  cardId: number;
  company: string;
  contactName: string;
  role: ContactRole;
  created: boolean;
  phonesAdded: number;
  emailsAdded: number;
  mentionLinked: boolean;
}
