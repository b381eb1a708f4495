/**
 * Announcement detail page parser (www.ccgp.gov.cn).
 *
 * Pages carry a summary table (div.table) of label/value cells and a free-text
 * body (div.vF_detail_content). Structured fields come from the table first
 * and from labelled body lines second.
 */

import * as cheerio from 'cheerio';
import { ParseError } from '../types/errors.js';
import { cleanCompany, cleanContent, cleanDate, cleanTitle } from '../extractor/cleaner.js';

export interface ParsedDetail {
  title: string;
  publishDate: string;
  category: string;
  projectName: string;
  bidAmount: string;
  buyerName: string;
  agentName: string;
  supplierName: string;
  region: string;
  /** Summary table cells as label -> value, labels without trailing colons */
  summary: Record<string, string>;
  experts: string[];
  content: string;
  /** Summary table lines followed by the body; input to contact extraction */
  contactText: string;
}

const FIELD_NAMES = ['projectName', 'bidAmount', 'buyerName', 'agentName', 'supplierName', 'region'] as const;
type FieldName = typeof FIELD_NAMES[number];

// Party names end at the first space: "采购人：某学院 联系人：张三"
const PARTY_FIELDS: ReadonlySet<FieldName> = new Set<FieldName>(['buyerName', 'agentName', 'supplierName']);

const TABLE_FIELDS: ReadonlyMap<string, FieldName> = new Map<string, FieldName>([
  ['采购项目名称', 'projectName'],
  ['项目名称', 'projectName'],
  ['行政区域', 'region'],
  ['采购单位', 'buyerName'],
  ['采购人', 'buyerName'],
  ['代理机构名称', 'agentName'],
  ['代理机构', 'agentName'],
  ['供应商名称', 'supplierName'],
  ['中标供应商', 'supplierName'],
  ['中标人', 'supplierName'],
  ['中标单位', 'supplierName'],
  ['总中标金额', 'bidAmount'],
  ['中标金额', 'bidAmount'],
  ['成交金额', 'bidAmount'],
  ['预算金额', 'bidAmount'],
]);

// Labelled body lines, e.g. "采购人：浙江警察学院" or "1.供应商名称：某某公司"
const LINE_FIELDS: { field: FieldName; pattern: RegExp }[] = [
  { field: 'projectName', pattern: /^(?:[\d一二三四五六七八九十]+[.、．]\s*)?(?:采购)?项目名称[:：]\s*(.+)$/ },
  { field: 'buyerName', pattern: /^(?:[\d一二三四五六七八九十]+[.、．]\s*)?(?:采购人|采购单位)(?:名称)?[:：]\s*(.+)$/ },
  { field: 'agentName', pattern: /^(?:[\d一二三四五六七八九十]+[.、．]\s*)?(?:采购)?代理机构(?:名称)?[:：]\s*(.+)$/ },
  { field: 'supplierName', pattern: /^(?:[\d一二三四五六七八九十]+[.、．]\s*)?(?:中标|成交)?(?:供应商名称|供应商|中标人|成交人)[:：]\s*(.+)$/ },
  { field: 'bidAmount', pattern: /^(?:[\d一二三四五六七八九十]+[.、．]\s*)?(?:总)?(?:中标|成交)(?:（成交）)?金额[:：]\s*(.+)$/ },
];

// Section headings whose following "名 称：X" line names the party
const SECTION_HEADINGS: { field: FieldName; pattern: RegExp }[] = [
  { field: 'buyerName', pattern: /采购人信息|采购单位信息/ },
  { field: 'agentName', pattern: /采购代理机构信息|代理机构信息/ },
  { field: 'supplierName', pattern: /中标（成交）信息|中标信息|成交信息/ },
];

const NAME_LINE = /^名\s*称[:：]\s*(.+)$/;
const HEADING_LINE = /^(?:[一二三四五六七八九十]+、|\d+[.、．])/;

function squash(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Label/value pairs from the summary table. Cells alternate label, value.
 */
export function parseSummaryTable($: cheerio.CheerioAPI): Record<string, string> {
  const summary: Record<string, string> = {};

  $('div.table table tr').each((_, row) => {
    const cells = $(row).find('td, th').toArray();
    for (let i = 0; i + 1 < cells.length; i += 2) {
      const label = squash($(cells[i]).text()).replace(/[:：]$/, '').replace(/\s+/g, '');
      const value = squash($(cells[i + 1]).text());
      if (label && !Object.hasOwn(summary, label)) {
        summary[label] = value;
      }
    }
  });

  return summary;
}

/**
 * Body text with one line per block element.
 */
function blockText($: cheerio.CheerioAPI, selector: string): string {
  const container = $(selector).first();
  if (container.length === 0) return '';

  container.find('script, style').remove();
  container.find('br').replaceWith('\n');
  container.find('p, div, tr, li, h1, h2, h3, h4, h5, h6').each((_, el) => {
    $(el).append('\n');
  });
  container.find('td, th').each((_, el) => {
    $(el).append(' ');
  });

  return cleanContent(container.text());
}

export function splitExpertNames(value: string): string[] {
  return value
    .replace(/[（(][^）)]*[）)]/g, '')
    .split(/[、，,；;\s]+/)
    .map(name => name.trim())
    .filter(name => /^[一-龥·]{2,4}$/.test(name));
}

/**
 * Review-expert names from a "评审专家" line, or from the lines under that heading.
 */
export function findExpertNames(text: string): string[] {
  const lines = text.split('\n').map(line => line.trim()).filter(Boolean);
  const experts: string[] = [];

  for (let i = 0; i < lines.length; i++) {
    if (!lines[i].includes('评审专家')) continue;

    const inline = lines[i].split(/[:：]/).slice(1).join('');
    if (inline.trim()) {
      experts.push(...splitExpertNames(inline));
      continue;
    }
    for (let j = i + 1; j < lines.length; j++) {
      if (HEADING_LINE.test(lines[j]) || /[:：\d]/.test(lines[j])) break;
      experts.push(...splitExpertNames(lines[j]));
    }
  }

  return [...new Set(experts)];
}

function fieldValue(field: FieldName, raw: string): string {
  const value = raw.trim();
  return PARTY_FIELDS.has(field) ? value.split(/\s+/)[0] : value;
}

function fieldsFromBody(lines: string[]): Partial<Record<FieldName, string>> {
  const fields: Partial<Record<FieldName, string>> = {};
  let section: FieldName | null = null;

  for (const line of lines) {
    const heading = SECTION_HEADINGS.find(h => h.pattern.test(line));
    if (heading) {
      section = heading.field;
      continue;
    }

    const nameLine = line.match(NAME_LINE);
    if (nameLine && section && !fields[section]) {
      fields[section] = fieldValue(section, nameLine[1]);
      continue;
    }

    for (const { field, pattern } of LINE_FIELDS) {
      const match = line.match(pattern);
      if (match && !fields[field]) {
        fields[field] = fieldValue(field, match[1]);
      }
    }
  }

  return fields;
}

export function parseDetailPage(html: string, url: string): ParsedDetail {
  const $ = cheerio.load(html);

  const title = cleanTitle($('meta[name="ArticleTitle"]').attr('content') || $('h2.tc').first().text());
  const publishDate = cleanDate($('meta[name="PubDate"]').attr('content') || $('#pubTime').first().text());
  const category = ($('meta[name="ColumnName"]').attr('content') ?? '').trim();

  const summary = parseSummaryTable($);
  const content = blockText($, 'div.vF_detail_content');

  if (!title && !content) {
    throw new ParseError(url, 'no title and no announcement body');
  }

  const fields: Record<FieldName, string> = {
    projectName: '',
    bidAmount: '',
    buyerName: '',
    agentName: '',
    supplierName: '',
    region: '',
  };

  for (const [label, value] of Object.entries(summary)) {
    const field = TABLE_FIELDS.get(label);
    if (field && value && !fields[field]) {
      fields[field] = value;
    }
  }

  const lines = content.split('\n').map(line => line.trim()).filter(Boolean);
  const bodyFields = fieldsFromBody(lines);
  for (const field of FIELD_NAMES) {
    if (!fields[field]) {
      fields[field] = bodyFields[field] ?? '';
    }
  }

  const tableLines = Object.entries(summary).map(([label, value]) => `${label}：${value}`);
  const contactText = [...tableLines, content].filter(Boolean).join('\n');

  return {
    title,
    publishDate,
    category,
    projectName: fields.projectName,
    bidAmount: fields.bidAmount,
    buyerName: cleanCompany(fields.buyerName),
    agentName: cleanCompany(fields.agentName),
    supplierName: cleanCompany(fields.supplierName),
    region: fields.region,
    summary,
    experts: findExpertNames(contactText),
    content,
    contactText,
  };
}
