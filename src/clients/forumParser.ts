import { load } from 'cheerio';
import type { ForumComment } from '../types/index.js';
import { extractPostedAt } from '../utils/time.js';
import { preview } from '../utils/text.js';

export type SkipReason = 'missing-date' | 'missing-text';

export interface SkippedPost {
  position: number;
  reason: SkipReason;
  preview: string;
}

export interface ParsedPage {
  comments: ForumComment[];
  skipped: SkippedPost[];
}

/**
 * Each post on the board is a `table.layer`: a header div floated left holds
 * `投稿日: YYYY年MM月DD日 HH:MM`, and the body sits in a span inside the
 * 15px-font cell. Posts missing either part are reported, not returned.
 */
export function parseForumPage(html: string, sourceUrl: string, pageIndex: number): ParsedPage {
  const $ = load(html);
  const comments: ForumComment[] = [];
  const skipped: SkippedPost[] = [];

  $('table.layer').each((position, element) => {
    const $post = $(element);
    const header = $post.find('div').filter((_, el) => normalizeStyle($(el).attr('style')).includes('float:left')).first();
    const body = $post.find('td').filter((_, el) => normalizeStyle($(el).attr('style')).includes('font-size:15px')).first();

    const postedAt = header.length > 0 ? extractPostedAt(header.text()) : null;
    const text = body.find('span').first().text().trim();

    if (!postedAt) {
      skipped.push({ position, reason: 'missing-date', preview: preview(text) });
      return;
    }
    if (!text) {
      skipped.push({ position, reason: 'missing-text', preview: '' });
      return;
    }
    comments.push({ text, postedAt, sourceUrl, pageIndex });
  });

  return { comments, skipped };
}

/**
 * Numbered links in the board's pagination strip, resolved against the page
 * URL, in page order and without duplicates. Arrows such as `>>` are ignored.
 */
export function parsePaginationLinks(html: string, pageUrl: string): string[] {
  const $ = load(html);
  const strip = $('div')
    .filter((_, el) => {
      const style = normalizeStyle($(el).attr('style'));
      return style.includes('font-size:13px') && style.includes('margin-bottom:4px');
    })
    .first();

  const numbered: Array<{ page: number; url: string }> = [];
  strip.find('a.n').each((_, el) => {
    const label = $(el).text().trim();
    const href = $(el).attr('href');
    if (!/^\d+$/.test(label) || !href || !URL.canParse(href, pageUrl)) {
      return;
    }
    numbered.push({ page: Number(label), url: new URL(href, pageUrl).toString() });
  });

  const seen = new Set<string>();
  return numbered
    .sort((a, b) => a.page - b.page)
    .map(({ url }) => url)
    .filter((url) => {
      if (seen.has(url)) {
        return false;
      }
      seen.add(url);
      return true;
    });
}

function normalizeStyle(style: string | undefined): string {
  return (style ?? '').replace(/\s+/g, '').toLowerCase();
}
