import { dbHelpers } from '../db/database.js';
import { cleanDate } from '../extractor/cleaner.js';
import { extractContacts } from '../extractor/contact-extractor.js';
import { openTempDb, type TempDb } from '../test-utils/temp-db.js';
import type { ContactMention, NewAnnouncement } from '../types/index.js';
import {
  findCards,
  getCard,
  ingestAnnouncement,
  listCardMentions,
  reprocessAnnouncement,
  resolveCardKey,
  searchCards,
} from './card-resolver.js';

const TEXT_A = '采购人：浙江警察学院 联系人：张三 电话：13812345678';
const TEXT_B = '采购人：浙江警察学院 联系人：张三 电话：0571-88888888 邮箱：zhang@example.com';

function announcement(url: string, content: string, overrides: Partial<NewAnnouncement> = {}): NewAnnouncement {
  return {
    url,
    title: '测试公告',
    publishDate: '2024-03-05',
    source: 'ccgp-bxsearch',
    category: '',
    buyerName: '浙江警察学院',
    agentName: '',
    supplierName: '',
    projectName: '',
    bidAmount: '',
    region: '',
    content,
    scrapedAt: '2024-03-05T00:00:00.000Z',
    ...overrides,
  };
}

function mention(overrides: Partial<ContactMention>): ContactMention {
  return {
    role: 'contact',
    name: '',
    phones: [],
    emails: [],
    companyRole: null,
    span: { start: 0, end: 0, excerpt: '' },
    ...overrides,
  };
}

async function ingest(url: string, content: string, overrides: Partial<NewAnnouncement> = {}) {
  return ingestAnnouncement(announcement(url, content, overrides), extractContacts(content));
}

let db: TempDb;

beforeAll(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  db = await openTempDb();
});

afterAll(async () => {
  await db.cleanup();
  vi.restoreAllMocks();
});

beforeEach(async () => {
  await db.reset();
});

describe('resolveCardKey', () => {
  const parties = { buyerName: ' 浙江警察学院、', agentName: '某代理公司', supplierName: '' };

  it('takes the company from the mention role', () => {
    expect(resolveCardKey(parties, mention({ role: 'buyer', name: '张 三' }))).toEqual({
      company: '浙江警察学院',
      contactName: '张三',
    });
  });

  it('uses the preceding company role for contact mentions', () => {
    expect(resolveCardKey(parties, mention({ companyRole: 'agent', name: '李四' }))).toEqual({
      company: '某代理公司',
      contactName: '李四',
    });
  });

  it('leaves the company empty without a company role', () => {
    expect(resolveCardKey(parties, mention({ name: '李四' }))).toEqual({ company: '', contactName: '李四' });
  });

  it('returns null when both parts are empty', () => {
    expect(resolveCardKey(parties, mention({ phones: ['13900001111'] }))).toBeNull();
  });
});

describe('ingestAnnouncement', () => {
  it('creates one card per company and contact', async () => {
    const result = await ingest('http://example.test/a', TEXT_A);

    expect(result.created).toBe(true);
    expect(result.outcomes).toEqual([
      expect.objectContaining({ company: '浙江警察学院', contactName: '张三', role: 'buyer', created: true, phonesAdded: 1 }),
    ]);

    const [card, ...rest] = await findCards('浙江警察学院');
    expect(rest).toEqual([]);
    expect(card.contactName).toBe('张三');
    expect(card.phones).toEqual(['13812345678']);
    expect(card.emails).toEqual([]);
    expect(card.announcementCount).toBe(1);
  });

  it('unions phones and emails across announcements', async () => {
    await ingest('http://example.test/a', TEXT_A);
    const second = await ingest('http://example.test/b', TEXT_B, { publishDate: '2024-04-01' });

    expect(second.outcomes).toEqual([
      expect.objectContaining({ created: false, phonesAdded: 1, emailsAdded: 1, mentionLinked: true }),
    ]);

    const [card] = await findCards('浙江警察学院');
    expect(card.phones).toEqual(['13812345678', '0571-88888888']);
    expect(card.emails).toEqual(['zhang@example.com']);
    expect(card.announcementCount).toBe(2);

    const mentions = await listCardMentions(card.id);
    expect(mentions.map(m => [m.url, m.role])).toEqual([
      ['http://example.test/b', 'buyer'],
      ['http://example.test/a', 'buyer'],
    ]);
  });

  it('never removes contact details', async () => {
    await ingest('http://example.test/b', TEXT_B);
    await ingest('http://example.test/c', '采购人：浙江警察学院 联系人：张三');

    const [card] = await findCards('浙江警察学院');
    expect(card.phones).toEqual(['0571-88888888']);
    expect(card.emails).toEqual(['zhang@example.com']);
    expect(card.announcementCount).toBe(2);
  });

  it('leaves an already stored announcement untouched', async () => {
    await ingest('http://example.test/a', TEXT_A);
    const before = await dbHelpers.getStats();

    const again = await ingest('http://example.test/a', TEXT_B);

    expect(again.created).toBe(false);
    expect(again.outcomes).toEqual([]);
    expect(await dbHelpers.getStats()).toEqual(before);
    const [card] = await findCards('浙江警察学院');
    expect(card.phones).toEqual(['13812345678']);
  });

  it('keeps one card per key when several roles name the same person', async () => {
    const result = await ingestAnnouncement(announcement('http://example.test/d', ''), [
      mention({ role: 'buyer', name: '张三', phones: ['13812345678'] }),
      mention({ role: 'contact', companyRole: 'buyer', name: '张三', emails: ['zhang@example.com'] }),
    ]);

    expect(result.outcomes.map(o => o.created)).toEqual([true, false]);
    const stats = await dbHelpers.getStats();
    expect(stats.total_cards).toBe(1);
    expect(stats.total_card_mentions).toBe(2);
  });

  it('counts mentions without company or name as unattributed', async () => {
    const result = await ingestAnnouncement(announcement('http://example.test/e', ''), [
      mention({ phones: ['13900001111'] }),
    ]);

    expect(result.outcomes).toEqual([]);
    expect(result.unattributed).toBe(1);
    expect((await dbHelpers.getStats()).total_cards).toBe(0);
  });
});

describe('reprocessAnnouncement', () => {
  it('re-merges a stored announcement without changing anything', async () => {
    await ingest('http://example.test/a', TEXT_A);

    const result = await reprocessAnnouncement('http://example.test/a');

    expect(result?.created).toBe(false);
    expect(result?.outcomes).toEqual([
      expect.objectContaining({ created: false, phonesAdded: 0, emailsAdded: 0, mentionLinked: false }),
    ]);
    expect((await dbHelpers.getStats()).total_cards).toBe(1);
  });

  it('returns null for an unknown url', async () => {
    expect(await reprocessAnnouncement('http://example.test/missing')).toBeNull();
  });
});

describe('card queries', () => {
  it('matches companies by substring with like', async () => {
    await ingest('http://example.test/a', TEXT_A);

    expect(await findCards('警察')).toEqual([]);
    expect((await findCards('警察', { like: true })).map(c => c.contactName)).toEqual(['张三']);
  });

  it('treats LIKE wildcards in a company query literally', async () => {
    await ingest('http://example.test/a', TEXT_A);
    await ingest('http://example.test/b', '采购人：甲_乙公司 联系人：李四 电话：13912345678', { buyerName: '甲_乙公司' });

    expect(await findCards('警_学院', { like: true })).toEqual([]);
    expect(await findCards('%', { like: true })).toEqual([]);
    expect((await findCards('甲_乙', { like: true })).map(c => c.contactName)).toEqual(['李四']);
    expect((await searchCards('_')).items.map(c => c.company)).toEqual(['甲_乙公司']);
  });

  it('lists mentions newest first across date formats', async () => {
    await ingest('http://example.test/a', TEXT_A, { publishDate: cleanDate('2024年3月5日') });
    await ingest('http://example.test/b', TEXT_B, { publishDate: cleanDate('2024年12月1日') });

    const [card] = await findCards('浙江警察学院');
    const mentions = await listCardMentions(card.id);
    expect(mentions.map(m => [m.url, m.publishDate])).toEqual([
      ['http://example.test/b', '2024-12-01'],
      ['http://example.test/a', '2024-03-05'],
    ]);
  });

  it('searches company and contact name', async () => {
    await ingest('http://example.test/a', TEXT_A);

    const byName = await searchCards('张三');
    expect(byName.total).toBe(1);
    expect(await getCard(byName.items[0].id)).toEqual(byName.items[0]);
    expect((await searchCards('不存在')).total).toBe(0);
  });
});
