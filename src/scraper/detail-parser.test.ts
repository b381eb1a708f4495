import { ParseError } from '../types/errors.js';
import { awardPageHtml, plainPageHtml } from '../test-utils/fixtures.js';
import { findExpertNames, parseDetailPage, splitExpertNames } from './detail-parser.js';

const URL = 'http://www.ccgp.gov.cn/cggg/dfgg/zbgg/202403/t20240305_1.htm';

describe('parseDetailPage', () => {
  it('reads meta fields and the summary table', () => {
    const parsed = parseDetailPage(awardPageHtml(), URL);

    expect(parsed.title).toBe('浙江警察学院智能化设备采购项目中标公告');
    expect(parsed.publishDate).toBe('2024-03-05 10:30');
    expect(parsed.category).toBe('中标公告');
    expect(parsed.projectName).toBe('智能化设备采购');
    expect(parsed.region).toBe('浙江省');
    expect(parsed.buyerName).toBe('浙江警察学院');
    expect(parsed.agentName).toBe('某某招标有限公司');
    expect(parsed.bidAmount).toBe('￥120.5万元');
    expect(parsed.summary['公告时间']).toBe('2024年03月05日');
  });

  it('takes the supplier from a labelled body line', () => {
    expect(parseDetailPage(awardPageHtml(), URL).supplierName).toBe('杭州某某科技有限公司');
  });

  it('lists review experts under their heading', () => {
    expect(parseDetailPage(awardPageHtml(), URL).experts).toEqual(['王五', '赵六']);
  });

  it('keeps one body line per paragraph and line break', () => {
    const { content } = parseDetailPage(awardPageHtml(), URL);
    const lines = content.split('\n').filter(Boolean);

    expect(lines).toContain('联系人：张三 电话：13812345678');
    expect(lines).toContain('联系人：李四');
    expect(lines).toContain('电话：0571-88888888');
  });

  it('puts the summary table ahead of the body in contactText', () => {
    const { contactText } = parseDetailPage(awardPageHtml(), URL);
    expect(contactText.split('\n').slice(0, 3)).toEqual([
      '采购项目名称：智能化设备采购',
      '行政区域：浙江省',
      '公告时间：2024年03月05日',
    ]);
  });

  it('falls back to the heading, pubTime and body party lines', () => {
    const parsed = parseDetailPage(
      plainPageHtml({
        title: '某学院弱电工程询价公告',
        body: ['采购人：某学院 联系人：王五', '采购代理机构：某代理公司，'],
      }),
      URL
    );

    expect(parsed.title).toBe('某学院弱电工程询价公告');
    expect(parsed.publishDate).toBe('2024-03-05 09:00');
    expect(parsed.buyerName).toBe('某学院');
    expect(parsed.agentName).toBe('某代理公司');
    expect(parsed.summary).toEqual({});
  });

  it('rejects a page with neither title nor body', () => {
    expect(() => parseDetailPage('<html><body><p>404</p></body></html>', URL)).toThrow(ParseError);
  });
});

describe('findExpertNames', () => {
  it('reads names on the same line', () => {
    expect(findExpertNames('评审专家：王五、赵六，孙七')).toEqual(['王五', '赵六', '孙七']);
  });

  it('stops at the next heading or labelled line', () => {
    const text = ['评审专家名单：', '王五 赵六', '联系人：张三', '李四'].join('\n');
    expect(findExpertNames(text)).toEqual(['王五', '赵六']);
  });
});

describe('splitExpertNames', () => {
  it('drops bracketed notes and non-name tokens', () => {
    expect(splitExpertNames('王五（组长）、赵六(采购人代表)、Smith')).toEqual(['王五', '赵六']);
  });
});
