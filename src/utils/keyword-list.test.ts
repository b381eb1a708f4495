import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  dedupeKeywords,
  loadKeywords,
  parseKeywordFile,
  readKeywordFile,
  splitKeywords,
  writeKeywordFile,
} from './keyword-list.js';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'keywords-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('splitKeywords', () => {
  it('splits on ASCII and full-width commas', () => {
    expect(splitKeywords('智能, 机房，弱电,,')).toEqual(['智能', '机房', '弱电']);
  });
});

describe('dedupeKeywords', () => {
  it('keeps the first occurrence', () => {
    expect(dedupeKeywords(['弱电', '智能', ' 弱电 '])).toEqual(['弱电', '智能']);
  });
});

describe('parseKeywordFile', () => {
  it('skips comments and blank lines', () => {
    const content = '\uFEFF# keywords\n智能\n\n机房,弱电\r\n# 智慧\n智能\n';
    expect(parseKeywordFile(content)).toEqual(['智能', '机房', '弱电']);
  });
});

describe('keyword files', () => {
  it('reads nothing from a missing file', async () => {
    expect(await readKeywordFile(path.join(dir, 'missing.txt'))).toEqual([]);
  });

  it('keeps the comment header when rewriting', async () => {
    const file = path.join(dir, 'keywords.txt');
    fs.writeFileSync(file, '# one per line\n# or comma separated\n旧词\n');

    const saved = await writeKeywordFile(file, ['智能', '弱电', '智能']);

    expect(saved).toEqual(['智能', '弱电']);
    expect(fs.readFileSync(file, 'utf-8')).toBe('# one per line\n# or comma separated\n智能\n弱电\n');
  });

  it('merges direct keywords with a keyword file', async () => {
    const file = path.join(dir, 'keywords.txt');
    fs.writeFileSync(file, '机房\n智能\n');

    expect(await loadKeywords({ keywords: '智能，弱电', keywordFile: file })).toEqual(['智能', '弱电', '机房']);
    expect(await loadKeywords({ keywords: ['a,b', 'c'] })).toEqual(['a', 'b', 'c']);
  });
});
