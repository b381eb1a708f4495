/**
 * Keyword input: lists, delimited strings and keyword files.
 * Keyword files hold one or more comma-separated keywords per line; lines starting with # are comments.
 */

import fs from 'fs';
import path from 'path';

export function splitKeywords(value: string): string[] {
  return value
    .split(/[,，\n]/)
    .map(k => k.trim())
    .filter(Boolean);
}

/** Order-preserving dedup */
export function dedupeKeywords(keywords: Iterable<string>): string[] {
  return [...new Set([...keywords].map(k => k.trim()).filter(Boolean))];
}

export function parseKeywordFile(content: string): string[] {
  const keywords: string[] = [];

  for (const raw of content.split(/\r?\n/)) {
    const line = raw.replace(/^\uFEFF/, '').trim();
    if (!line || line.startsWith('#')) continue;
    keywords.push(...splitKeywords(line));
  }

  return dedupeKeywords(keywords);
}

/**
 * Read a keyword file; a missing file yields no keywords.
 */
export async function readKeywordFile(filePath: string): Promise<string[]> {
  try {
    return parseKeywordFile(await fs.promises.readFile(filePath, 'utf-8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

/**
 * Rewrite a keyword file, keeping its leading comment block.
 */
export async function writeKeywordFile(filePath: string, keywords: string[]): Promise<string[]> {
  const cleaned = dedupeKeywords(keywords);

  const header: string[] = [];
  try {
    const existing = await fs.promises.readFile(filePath, 'utf-8');
    for (const line of existing.split(/\r?\n/)) {
      if (!line.trim().startsWith('#')) break;
      header.push(line);
    }
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error;
  }

  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, [...header, ...cleaned].join('\n') + '\n', 'utf-8');
  return cleaned;
}

export interface KeywordSources {
  keywords?: string | string[];
  keywordFile?: string;
}

/**
 * Merge keywords from a list or delimited string and an optional keyword file.
 */
export async function loadKeywords(sources: KeywordSources): Promise<string[]> {
  const direct = typeof sources.keywords === 'string'
    ? splitKeywords(sources.keywords)
    : (sources.keywords ?? []).flatMap(splitKeywords);

  const fromFile = sources.keywordFile ? await readKeywordFile(sources.keywordFile) : [];

  return dedupeKeywords([...direct, ...fromFile]);
}
