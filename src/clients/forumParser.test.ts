import { describe, it, expect } from 'vitest';
import { parseForumPage, parsePaginationLinks } from './forumParser.js';

const PAGE_URL = 'https://example.test/board/';

function post(header: string, body: string): string {
  return `<table class="layer"><tr><td><div style="float: left;">${header}</div></td></tr>
<tr><td style="font-size: 15px; line-height: 1.5;"><span>${body}</span></td></tr></table>`;
}

describe('parseForumPage', () => {
  it('reads timestamp and text from each post', () => {
    const html = `<html><body>${post('投稿日: 2025年04月01日 23:15 名前: test', '今夜は30匹')}${post(
      '投稿日: 2025年04月02日 01:05',
      '  爆寄りでした  ',
    )}</body></html>`;

    expect(parseForumPage(html, PAGE_URL, 2)).toEqual({
      comments: [
        { text: '今夜は30匹', postedAt: '2025年04月01日 23:15', sourceUrl: PAGE_URL, pageIndex: 2 },
        { text: '爆寄りでした', postedAt: '2025年04月02日 01:05', sourceUrl: PAGE_URL, pageIndex: 2 },
      ],
      skipped: [],
    });
  });

  it('reports posts without a date or without text', () => {
    const html = `<html><body>${post('名前: test', 'いない')}${post('投稿日: 2025年04月01日 23:15', '')}</body></html>`;

    expect(parseForumPage(html, PAGE_URL, 1)).toEqual({
      comments: [],
      skipped: [
        { position: 0, reason: 'missing-date', preview: 'いない' },
        { position: 1, reason: 'missing-text', preview: '' },
      ],
    });
  });

  it('returns nothing for a page without posts', () => {
    expect(parseForumPage('<html><body><p>メンテナンス中</p></body></html>', PAGE_URL, 1)).toEqual({
      comments: [],
      skipped: [],
    });
  });
});

describe('parsePaginationLinks', () => {
  it('collects numbered links from the pagination strip in page order', () => {
    const html = `<html><body>
<div style="font-size: 13px; margin-bottom: 4px;">
  <a class="n" href="link3">3</a><a class="n" href="link2">2</a><a class="n" href="link2">2</a><a class="n" href="link4">&gt;&gt;</a>
</div>
<div><a class="n" href="elsewhere">9</a></div>
</body></html>`;

    expect(parsePaginationLinks(html, PAGE_URL)).toEqual([
      'https://example.test/board/link2',
      'https://example.test/board/link3',
    ]);
  });

  it('returns an empty list without a strip', () => {
    expect(parsePaginationLinks('<html><body></body></html>', PAGE_URL)).toEqual([]);
  });
});
