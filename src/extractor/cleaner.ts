// Text normalization for scraped announcement fields

const MAX_TITLE_LENGTH = 500;
const MAX_CONTENT_LENGTH = 50000;

export const SITE_ORIGIN = 'https://www.ccgp.gov.cn/';

export function cleanTitle(title: string | null | undefined): string {
  if (!title) return '';

  let cleaned = title.replace(/\s+/g, ' ').trim();
  cleaned = cleaned.replace(/[\x00-\x1f\x7f-\x9f]/g, '');

  if (cleaned.length > MAX_TITLE_LENGTH) {
    cleaned = cleaned.slice(0, MAX_TITLE_LENGTH) + '...';
  }
  return cleaned;
}

/**
 * Collapse runs of spaces and blank lines, keep line structure.
 * Line structure matters: contact names are only paired within one line.
 */
export function cleanContent(content: string | null | undefined): string {
  if (!content) return '';

  let cleaned = content
    .replace(/\r\n?/g, '\n')
    .replace(/[\x00-\x08\x0b\x0c\x0e-\x1f\x7f]/g, '')
    .replace(/[ \t\u00a0\u3000]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();

  if (cleaned.length > MAX_CONTENT_LENGTH) {
    cleaned = cleaned.slice(0, MAX_CONTENT_LENGTH) + '\n...(truncated)';
  }
  return cleaned;
}

/**
 * "2024年1月5日" -> "2024-01-05", "2024.01.05 10:00" -> "2024-01-05 10:00"
 */
export function cleanDate(date: string | null | undefined): string {
  if (!date) return '';
  return date
    .trim()
    .replace(/[年月./]/g, '-')
    .replace(/日/g, '')
    .replace(/^(\d{4})-(\d{1,2})-(\d{1,2})(?!\d)/, (_, y: string, m: string, d: string) =>
      `${y}-${m.padStart(2, '0')}-${d.padStart(2, '0')}`);
}

export function cleanCompany(company: string | null | undefined): string {
  if (!company) return '';
  return company.trim().replace(/[、,，;；]/g, '');
}

/**
 * Absolute URL for a scraped href; protocol-relative links get http:.
 */
export function cleanUrl(url: string | null | undefined, base: string = SITE_ORIGIN): string {
  if (!url) return '';

  const trimmed = url.trim();
  if (trimmed.startsWith('//')) return `http:${trimmed}`;
  if (/^https?:\/\//i.test(trimmed)) return trimmed;

  try {
    return new URL(trimmed, base).toString();
  } catch {
    return trimmed;
  }
}
