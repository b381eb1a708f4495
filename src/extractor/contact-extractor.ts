/**
 * Contact extraction from announcement text.
 *
 * Phones and emails are located first; each fact is then attributed to the
 * nearest preceding role anchor inside the lookback window and paired with a
 * person's name from the same line or from a names-follow label. Facts are
 * grouped into one ContactMention per (role, company role, name).
 */

import type { CompanyRole, ContactMention, ContactRole } from '../types/index.js';
import {
  DEFAULT_LOOKBACK_CHARS,
  LABEL_WORDS,
  ROLE_ANCHORS,
  findAnchors,
  isCompanyBearing,
  type AnchorHit,
  type RoleAnchor,
} from './role-anchors.js';

export interface ExtractOptions {
  lookbackChars?: number;
  anchors?: readonly RoleAnchor[];
  /** Names that must never become a contact name (review experts) */
  excludedNames?: Iterable<string>;
}

export interface FoundFact {
  start: number;
  end: number;
  value: string;
}

const MOBILE_RE = /(?<![\dA-Za-z])1[3-9]\d{9}(?![\dA-Za-z])/g;
const LANDLINE_RE =
  /(?<![\dA-Za-z])(?:[(（](0\d{2,3})[)）]\s?|(0\d{2,3})[-－—]\s?)(\d{7,8})(?:\s*(?:转|-|ext\.?|EXT\.?)\s*(\d{1,6}))?(?![\dA-Za-z])/g;
const SUFFIX_RE = /\s*[\/\\、]\s*(\d{4,8})(?![\dA-Za-z\-－—])/y;
const EMAIL_RE = /[A-Za-z0-9._%+-]+@[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)+/g;

const CJK_RE = /[一-龥·]/;
const MAX_EXCERPT = 200;

// ============================================
// Facts
// ============================================

export function findEmails(text: string): FoundFact[] {
  return [...text.matchAll(EMAIL_RE)].map(match => ({
    start: match.index ?? 0,
    end: (match.index ?? 0) + match[0].length,
    value: match[0].toLowerCase(),
  }));
}

function overlaps(fact: { start: number; end: number }, others: FoundFact[]): boolean {
  return others.some(other => fact.start < other.end && fact.end > other.start);
}

interface FullPhone extends FoundFact {
  area: string | null;
  local: string;
}

/**
 * Shorthand numbers after a full phone: "010-81168617/8612" also means 010-81168612.
 * Suffixes are read only up to `limit`, where the next full number starts.
 */
function expandSuffixes(text: string, phone: FullPhone, limit: number): {
  phones: string[];
  end: number;
} {
  const phones: string[] = [];
  const { area, local } = phone;
  let cursor = phone.end;

  for (;;) {
    SUFFIX_RE.lastIndex = cursor;
    const match = SUFFIX_RE.exec(text);
    if (!match || SUFFIX_RE.lastIndex > limit) break;
    const suffix = match[1];
    if (suffix.length <= local.length) {
      const expanded = local.slice(0, local.length - suffix.length) + suffix;
      phones.push(area ? `${area}-${expanded}` : expanded);
    }
    cursor = SUFFIX_RE.lastIndex;
  }

  return { phones, end: cursor };
}

function fullPhones(text: string, emails: FoundFact[]): FullPhone[] {
  const phones: FullPhone[] = [];

  for (const match of text.matchAll(LANDLINE_RE)) {
    const start = match.index ?? 0;
    const fact = { start, end: start + match[0].length };
    if (overlaps(fact, emails)) continue;

    const area = match[1] ?? match[2] ?? '';
    const local = match[3];
    const ext = match[4];
    phones.push({ ...fact, area, local, value: ext ? `${area}-${local}-${ext}` : `${area}-${local}` });
  }

  for (const match of text.matchAll(MOBILE_RE)) {
    const start = match.index ?? 0;
    const fact = { start, end: start + match[0].length };
    if (overlaps(fact, emails) || overlaps(fact, phones)) continue;
    phones.push({ ...fact, area: null, local: match[0], value: match[0] });
  }

  return phones.sort((a, b) => a.start - b.start);
}

/**
 * Phone numbers in `text`, normalized to "13812345678" or "0571-88888888[-ext]".
 * Digits inside email addresses are ignored.
 */
export function findPhones(text: string, emails: FoundFact[] = findEmails(text)): FoundFact[] {
  const phones = fullPhones(text, emails);
  const found: FoundFact[] = [];

  phones.forEach((phone, i) => {
    const { start, end, value } = phone;
    found.push({ start, end, value });

    const limit = phones[i + 1]?.start ?? text.length;
    const expanded = expandSuffixes(text, phone, limit);
    for (const extra of expanded.phones) {
      found.push({ start, end: expanded.end, value: extra });
    }
  });

  return found;
}

// ============================================
// Names
// ============================================

function isCjk(ch: string | undefined): boolean {
  return ch !== undefined && CJK_RE.test(ch);
}

export function isLabelWord(token: string): boolean {
  return LABEL_WORDS.some(word => token.includes(word));
}

/**
 * A 2-4 character name directly before `position` on the same line,
 * skipping spaces and colons ("张三 13812345678", "张三：1381...").
 */
export function nameBefore(text: string, position: number): string {
  let i = position - 1;
  while (i >= 0 && /[ \t\u3000:：]/.test(text[i])) i--;

  const end = i + 1;
  while (i >= 0 && isCjk(text[i]) && end - i <= 5) i--;
  const token = text.slice(i + 1, end);

  if (token.length < 2 || token.length > 4) return '';
  if (isLabelWord(token)) return '';
  return token;
}

/**
 * The name following a label such as "联系人：", cut at the next label word.
 */
export function nameAfter(text: string, position: number): string {
  let i = position;
  while (i < text.length && /[ \t\u3000:：]/.test(text[i])) i++;

  const start = i;
  while (i < text.length && isCjk(text[i])) i++;
  let token = text.slice(start, i);

  for (const word of LABEL_WORDS) {
    const at = token.indexOf(word);
    if (at !== -1) token = token.slice(0, at);
  }

  return token.length >= 2 && token.length <= 4 ? token : '';
}

// ============================================
// Role attribution
// ============================================

interface Attribution {
  role: ContactRole;
  companyRole: CompanyRole | null;
  anchor: AnchorHit | null;
}

function toCompanyRole(hit: AnchorHit | undefined): CompanyRole | null {
  if (!hit) return null;
  const role = hit.anchor.role;
  return role === 'contact' ? null : role;
}

function lastBefore(hits: AnchorHit[], position: number, accept: (hit: AnchorHit) => boolean): AnchorHit | undefined {
  for (let i = hits.length - 1; i >= 0; i--) {
    if (hits[i].end <= position && accept(hits[i])) return hits[i];
  }
  return undefined;
}

function attribute(hits: AnchorHit[], position: number, lookback: number): Attribution {
  const nearest = lastBefore(hits, position, () => true);

  if (nearest && position - nearest.end <= lookback) {
    if (isCompanyBearing(nearest)) {
      return { role: nearest.anchor.role, companyRole: null, anchor: nearest };
    }

    const owner = lastBefore(hits, nearest.start, isCompanyBearing);
    const ownerRole = toCompanyRole(owner);
    if (owner && ownerRole && nearest.start - owner.end <= lookback) {
      return { role: ownerRole, companyRole: null, anchor: nearest };
    }
    return { role: 'contact', companyRole: ownerRole, anchor: nearest };
  }

  return {
    role: 'contact',
    companyRole: toCompanyRole(lastBefore(hits, position, isCompanyBearing)),
    anchor: null,
  };
}

/** Name from the closest names-follow label before `position`, stopping at a company label */
function labelledName(text: string, hits: AnchorHit[], position: number, lookback: number): string {
  for (let i = hits.length - 1; i >= 0; i--) {
    const hit = hits[i];
    if (hit.end > position) continue;
    if (position - hit.end > lookback || isCompanyBearing(hit)) break;
    if (hit.anchor.namesFollow) {
      const name = nameAfter(text, hit.end);
      if (name) return name;
    }
  }
  return '';
}

// ============================================
// Extraction
// ============================================

interface Group {
  role: ContactRole;
  companyRole: CompanyRole | null;
  name: string;
  phones: Set<string>;
  emails: Set<string>;
  start: number;
  end: number;
}

function sameFacts(a: Group, b: Group): boolean {
  if (a.role !== b.role || a.name !== b.name) return false;
  if (a.phones.size !== b.phones.size || a.emails.size !== b.emails.size) return false;
  return [...a.phones].every(p => b.phones.has(p)) && [...a.emails].every(e => b.emails.has(e));
}

export function extractContacts(text: string, options: ExtractOptions = {}): ContactMention[] {
  if (!text) return [];

  const lookback = options.lookbackChars ?? DEFAULT_LOOKBACK_CHARS;
  const excluded = new Set(options.excludedNames ?? []);
  const hits = findAnchors(text, options.anchors ?? ROLE_ANCHORS);
  const emails = findEmails(text);
  const phones = findPhones(text, emails);

  const groups = new Map<string, Group>();

  const add = (
    attribution: Attribution,
    name: string,
    start: number,
    end: number,
    fact?: { kind: 'phone' | 'email'; value: string }
  ) => {
    const cleanName = excluded.has(name) ? '' : name;
    const key = `${attribution.role}|${attribution.companyRole ?? ''}|${cleanName}`;
    let group = groups.get(key);
    if (!group) {
      group = {
        role: attribution.role,
        companyRole: attribution.role === 'contact' ? attribution.companyRole : null,
        name: cleanName,
        phones: new Set(),
        emails: new Set(),
        start,
        end,
      };
      groups.set(key, group);
    }
    group.start = Math.min(group.start, start);
    group.end = Math.max(group.end, end);
    if (fact?.kind === 'phone') group.phones.add(fact.value);
    if (fact?.kind === 'email') group.emails.add(fact.value);
  };

  // Names under a names-follow label count even without a phone or email
  for (const hit of hits) {
    if (!hit.anchor.namesFollow) continue;
    const name = nameAfter(text, hit.end);
    if (!name || excluded.has(name)) continue;
    add(attribute(hits, hit.end, lookback), name, hit.start, hit.end + name.length);
  }

  const facts = [
    ...phones.map(f => ({ ...f, kind: 'phone' as const })),
    ...emails.map(f => ({ ...f, kind: 'email' as const })),
  ].sort((a, b) => a.start - b.start);

  for (const fact of facts) {
    const attribution = attribute(hits, fact.start, lookback);
    const name = nameBefore(text, fact.start) || labelledName(text, hits, fact.start, lookback);
    const start = attribution.anchor ? attribution.anchor.start : fact.start;
    add(attribution, name, start, fact.end, { kind: fact.kind, value: fact.value });
  }

  const mentions: ContactMention[] = [];
  const kept: Group[] = [];

  for (const group of [...groups.values()].sort((a, b) => a.start - b.start)) {
    if (!group.name && group.phones.size === 0 && group.emails.size === 0) continue;
    if (kept.some(other => sameFacts(other, group))) continue;
    kept.push(group);

    mentions.push({
      role: group.role,
      name: group.name,
      phones: [...group.phones],
      emails: [...group.emails],
      companyRole: group.companyRole,
      span: {
        start: group.start,
        end: group.end,
        excerpt: text.slice(group.start, group.end).replace(/\s+/g, ' ').trim().slice(0, MAX_EXCERPT),
      },
    });
  }

  return mentions;
}
