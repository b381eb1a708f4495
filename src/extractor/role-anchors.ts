import type { ContactRole } from '../types/index.js';

export interface RoleAnchor {
  pattern: string;
  role: ContactRole;
  /** A person's name usually follows this label ("联系人：张三") */
  namesFollow: boolean;
}

/**
 * Role labels scanned in announcement text, longest first so that
 * "采购代理机构" wins over "代理机构" and "项目联系人" over "联系人".
 */
export const ROLE_ANCHORS: readonly RoleAnchor[] = [
  { pattern: '采购代理机构', role: 'agent', namesFollow: false },
  { pattern: '中标供应商', role: 'supplier', namesFollow: false },
  { pattern: '成交供应商', role: 'supplier', namesFollow: false },
  { pattern: '项目联系人', role: 'contact', namesFollow: true },
  { pattern: '代理机构', role: 'agent', namesFollow: false },
  { pattern: '采购单位', role: 'buyer', namesFollow: false },
  { pattern: '联系电话', role: 'contact', namesFollow: false },
  { pattern: '联系方式', role: 'contact', namesFollow: true },
  { pattern: '采购人', role: 'buyer', namesFollow: false },
  { pattern: '中标人', role: 'supplier', namesFollow: false },
  { pattern: '成交人', role: 'supplier', namesFollow: false },
  { pattern: '供应商', role: 'supplier', namesFollow: false },
  { pattern: '联系人', role: 'contact', namesFollow: true },
];

export const DEFAULT_LOOKBACK_CHARS = 80;

// Label fragments that are never part of a person's name
export const LABEL_WORDS: readonly string[] = [
  '电话', '手机', '联系', '方式', '传真', '邮箱', '邮件', '地址', '名称', '号码',
  '座机', '固话', '电子', '采购', '代理', '供应', '中标', '成交', '单位', '机构',
  '项目', '负责', '信息', '姓名',
];

export interface AnchorHit {
  start: number;
  end: number;
  anchor: RoleAnchor;
}

export function isCompanyBearing(hit: AnchorHit): boolean {
  return hit.anchor.role !== 'contact';
}

/**
 * Every anchor occurrence in `text`, ordered by position.
 * An occurrence inside a longer, already-matched label is ignored.
 */
export function findAnchors(text: string, anchors: readonly RoleAnchor[] = ROLE_ANCHORS): AnchorHit[] {
  const hits: AnchorHit[] = [];

  for (const anchor of anchors) {
    let from = 0;
    for (;;) {
      const start = text.indexOf(anchor.pattern, from);
      if (start === -1) break;
      const end = start + anchor.pattern.length;
      from = end;
      if (hits.some(hit => start < hit.end && end > hit.start)) continue;
      hits.push({ start, end, anchor });
    }
  }

  return hits.sort((a, b) => a.start - b.start);
}
