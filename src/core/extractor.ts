/**
 * Page extraction for anime1.me
 *
 * Turns a category or single-post page into structured posts. The upstream
 * markup is undocumented, so everything fragile lives here: callers only see
 * `parsePage()` and the `classifyPage` / `extract*` helpers.
 *
 * A post block missing one of its required elements fails the whole page with
 * MalformedPageError rather than silently dropping an episode.
 */

import * as cheerio from 'cheerio';
import type { Category, PageContent, Post } from '../types.js';
import { MalformedPageError } from '../types.js';

export type PageKind = 'category' | 'single' | 'unknown';

/** Link text of the "all episodes" link inside each post. */
export const ALL_EPISODES_LABEL = '全集連結';
/** Link text of the optional "next episode" link. */
export const NEXT_EPISODE_LABEL = '下一集';

const CATEGORY_ID_PATTERN = /'categoryID':\s'(.*?)'/;
const POST_ORDER_PATTERN = /^.*?\[(\d+)\]/;

// ── Classification ────────────────────────────────────────────────────────────

function bodyClasses($: cheerio.CheerioAPI): string[] {
  const classAttr = $('body[class]').first().attr('class');
  if (!classAttr) return [];
  return classAttr.split(/\s+/).filter(Boolean);
}

export function classifyPage($: cheerio.CheerioAPI): PageKind {
  const classes = bodyClasses($);
  if (classes.includes('category')) return 'category';
  if (classes.includes('single-post')) return 'single';
  return 'unknown';
}

// ── Posts ─────────────────────────────────────────────────────────────────────

/** Value after the first `=` of an href (`/?cat=1234` → `1234`). */
function queryValue(href: string | undefined): string | undefined {
  if (!href) return undefined;
  const value = href.split('=')[1];
  return value || undefined;
}

/** Leading `[N]` episode marker, if the title has one. */
export function parsePostOrder(title: string): number | undefined {
  const match = POST_ORDER_PATTERN.exec(title);
  return match ? parseInt(match[1], 10) : undefined;
}

function required<T>(value: T | undefined, postId: string, what: string): T {
  if (value === undefined) {
    throw new MalformedPageError(`Post ${postId}: missing ${what}`);
  }
  return value;
}

function decodeToken(raw: string, postId: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    throw new MalformedPageError(`Post ${postId}: resolution token is not valid percent-encoding`);
  }
}

/**
 * Orders posts the way the upstream means them: explicit `[N]` numbering wins,
 * otherwise the page lists newest first and is reversed.
 */
export function orderPosts(posts: readonly Post[]): Post[] {
  const allOrdered = posts.every((post) => post.order !== undefined);
  if (allOrdered) {
    return [...posts].sort((a, b) => (a.order ?? 0) - (b.order ?? 0));
  }
  return [...posts].reverse();
}

export function extractPosts($: cheerio.CheerioAPI): Post[] {
  const posts: Post[] = [];

  for (const el of $('article[id]').toArray()) {
    const article = $(el);
    const articleId = article.attr('id') ?? '';
    const id = required(articleId.split('-')[1] || undefined, articleId, 'numeric id');

    const header = article.find('header').first();
    const content = article.find('div.entry-content').first();
    const paragraph = content.find('p').first();
    const video = content.find('video[id]').first();

    const titleEl = header.find('h2').first();
    const title = required(titleEl.length > 0 ? titleEl.text() : undefined, id, 'title');
    const timestamp = required(header.find('time').first().attr('datetime'), id, 'timestamp');

    const allEpisodesLink = paragraph.find('a').filter((_, a) => $(a).text() === ALL_EPISODES_LABEL).first();
    const nextEpisodeLink = paragraph.find('a').filter((_, a) => $(a).text() === NEXT_EPISODE_LABEL).first();

    const post: Post = {
      id,
      title,
      order: parsePostOrder(title),
      timestamp,
      categoryId: required(queryValue(allEpisodesLink.attr('href')), id, 'category link'),
      videoId: required(video.attr('data-vid'), id, 'video id'),
      thumbnailsServer: required(video.attr('data-tserver'), id, 'thumbnail server'),
      resolutionToken: decodeToken(required(video.attr('data-apireq'), id, 'resolution token'), id),
      nextPostId: queryValue(nextEpisodeLink.attr('href')),
    };
    posts.push(post);
  }

  return orderPosts(posts);
}

// ── Categories ────────────────────────────────────────────────────────────────

function extractCategoryId($: cheerio.CheerioAPI): string | undefined {
  for (const el of $('script').toArray()) {
    const match = CATEGORY_ID_PATTERN.exec($(el).text());
    if (match) return match[1];
  }
  return undefined;
}

export function extractCategory($: cheerio.CheerioAPI): Category {
  const id = extractCategoryId($);
  if (id === undefined) {
    throw new MalformedPageError('Category page has no categoryID script payload');
  }

  const titleEl = $('header.page-header h1.page-title').first();
  if (titleEl.length === 0) {
    throw new MalformedPageError(`Category ${id}: missing page title`);
  }

  return {
    id,
    title: titleEl.text(),
    posts: extractPosts($),
  };
}

export function extractSinglePost($: cheerio.CheerioAPI): Post | null {
  const posts = extractPosts($);
  return posts[0] ?? null;
}

// ── Entry point ───────────────────────────────────────────────────────────────

export function parsePage(html: string): PageContent {
  const $ = cheerio.load(html);

  switch (classifyPage($)) {
    case 'category':
      return { kind: 'category', category: extractCategory($) };
    case 'single': {
      const post = extractSinglePost($);
      return post ? { kind: 'single', post } : { kind: 'unknown' };
    }
    default:
      return { kind: 'unknown' };
  }
}
