/**
 * Shared fixtures for the relay tests
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { Category, Post, ResolvedVideo } from '../types.js';

export function loadFixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), 'utf-8');
}

export function makePost(id: string, title: string, overrides: Partial<Post> = {}): Post {
  return {
    id,
    title,
    timestamp: '2024-01-01T12:00:00+08:00',
    categoryId: '1234',
    videoId: `vid${id}`,
    thumbnailsServer: 'pt1',
    resolutionToken: `{"c":"1234","e":"${id}"}`,
    ...overrides,
  };
}

export function makeCategory(posts: Post[], overrides: Partial<Category> = {}): Category {
  return { id: '1234', title: '測試番劇', posts, ...overrides };
}

export function makeVideo(overrides: Partial<ResolvedVideo> = {}): ResolvedVideo {
  return {
    backingUrl: 'https://cdn.example.test/video/101.mp4?sig=test-signature',
    mediaType: 'video/mp4',
    sessionCookies: ['e=1900000000', 'p=test-p', 'h=test-h'],
    expiresAt: 1899999995,
    ...overrides,
  };
}
