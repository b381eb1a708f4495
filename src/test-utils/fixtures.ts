// HTML builders for the list and detail pages used in tests

export interface ResultRowFixture {
  title: string;
  href: string;
  date?: string;
  buyer?: string;
  agent?: string;
}

export function resultRowHtml(row: ResultRowFixture): string {
  const parts = [row.date ?? '2024.03.05 10:30:00'];
  if (row.buyer) parts.push(`采购人：${row.buyer}`);
  if (row.agent) parts.push(`代理机构：${row.agent}`);

  return `<li>
  <a href="${row.href}" style="line-height:18px" target="_blank">${row.title}</a>
  <p>本项目……</p>
  <span>${parts.join(' | ')}</span>
</li>`;
}

export function resultPageHtml(rows: ResultRowFixture[], trailer = ''): string {
  return `<html><body>
<div class="vT-srch-result">
<ul class="vT-srch-result-list-bid">
${rows.map(resultRowHtml).join('\n')}
</ul>
${trailer}
</div>
</body></html>`;
}

export const THROTTLE_TRAILER = '<div class="tips">您的访问过于频繁，请稍后再试</div>';

export function awardPageHtml(): string {
  return `<html><head>
<meta name="ArticleTitle" content="浙江警察学院智能化设备采购项目中标公告">
<meta name="PubDate" content="2024-03-05 10:30">
<meta name="ColumnName" content="中标公告">
</head><body>
<div class="table"><table>
<tr><td>采购项目名称</td><td>智能化设备采购</td></tr>
<tr><td>行政区域</td><td>浙江省</td><td>公告时间</td><td>2024年03月05日</td></tr>
<tr><td>采购单位</td><td>浙江警察学院</td></tr>
<tr><td>代理机构名称</td><td>某某招标有限公司</td></tr>
<tr><td>总中标金额</td><td>￥120.5万元</td></tr>
</table></div>
<div class="vF_detail_content">
<p>一、项目名称：智能化设备采购</p>
<p>二、中标信息</p>
<p>供应商名称：杭州某某科技有限公司</p>
<p>三、评审专家名单：</p>
<p>王五、赵六（组长）</p>
<p>四、联系方式</p>
<p>1.采购人信息</p>
<p>名 称：浙江警察学院</p>
<p>联系人：张三 电话：13812345678</p>
<p>2.采购代理机构信息</p>
<p>联系人：李四<br>电话：0571-88888888</p>
</div>
</body></html>`;
}

/** A page with no summary table: title heading, pubTime and labelled body lines only */
export function plainPageHtml(opts: { title: string; body: string[] }): string {
  return `<html><body>
<h2 class="tc">${opts.title}</h2>
<span id="pubTime">2024年3月5日 09:00</span>
<div class="vF_detail_content">
${opts.body.map(line => `<p>${line}</p>`).join('\n')}
</div>
</body></html>`;
}
