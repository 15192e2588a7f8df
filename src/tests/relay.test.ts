/**
 * Tests for the relay service
 * Runs the real upstream client against a mocked undici fetch.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('undici', async (importOriginal) => {
  const actual = await importOriginal<typeof import('undici')>();
  class MockAgent {
    async close(): Promise<void> {
      return undefined;
    }
  }
  return { ...actual, fetch: vi.fn(), Agent: MockAgent };
});

import { fetch, Response } from 'undici';
import { Relay } from '../core/relay.js';
import {
  InvalidUrlError,
  UnknownCategoryError,
  UnknownUrlTypeError,
  UnknownVideoError,
  UnsupportedPlaylistFormatError,
  UpstreamError,
} from '../types.js';
import { loadFixture } from './helpers.js';

const mockFetch = vi.mocked(fetch);
const BASE = 'http://127.0.0.1:8520';
const BACKING_URL = 'https://cdn.example.test/v/101.mp4?sig=test-signature';

function htmlResponse(name: string): Response {
  return new Response(loadFixture(name), { status: 200, headers: { 'content-type': 'text/html' } });
}

function apiResponse(): Response {
  return new Response(JSON.stringify({ s: [{ src: '//cdn.example.test/v/101.mp4?sig=test-signature', type: 'video/mp4' }] }), {
    status: 200,
    headers: [['content-type', 'application/json'], ['set-cookie', 'e=1900000000'], ['set-cookie', 'p=test-p']],
  });
}

function videoResponse(status = 206): Response {
  return new Response(new Uint8Array([0, 1, 2]), {
    status,
    headers: { 'content-type': 'video/mp4', 'content-range': 'bytes 0-2/3' },
  });
}

function calledUrls(): unknown[] {
  return mockFetch.mock.calls.map(([url]) => url);
}

describe('Relay', () => {
  let relay: Relay;

  beforeEach(() => {
    vi.clearAllMocks();
    relay = new Relay({ timeoutMs: 1000, now: () => 1_800_000_000 });
  });

  afterEach(async () => {
    await relay.shutdown();
  });

  describe('resolve', () => {
    it('rejects a foreign URL without any request', async () => {
      await expect(relay.resolve(BASE, 'https://example.test/?cat=1234')).rejects.toBeInstanceOf(InvalidUrlError);
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('describes a category page', async () => {
      mockFetch.mockResolvedValueOnce(htmlResponse('category-numbered.html'));

      const result = await relay.resolve(`${BASE}/`, 'https://anime1.me/category/test');

      expect(result).toEqual({
        type: 'category',
        id: '1234',
        title: '測試番劇',
        url: `${BASE}/c/1234`,
        playlists: {
          m3u8: `${BASE}/c/1234?playlist=m3u8`,
          dpl: `${BASE}/c/1234?playlist=dpl`,
          dpl_ext: `${BASE}/c/1234?playlist=dpl_ext`,
          xspf: `${BASE}/c/1234?playlist=xspf`,
          xspf_ext: `${BASE}/c/1234?playlist=xspf_ext`,
        },
        videos: [
          { id: '101', title: '測試番劇 [01]', url: `${BASE}/v/101` },
          { id: '102', title: '測試番劇 [02]', url: `${BASE}/v/102` },
          { id: '103', title: '測試番劇 [03]', url: `${BASE}/v/103` },
        ],
      });
    });

    it('describes a single post page', async () => {
      mockFetch.mockResolvedValueOnce(htmlResponse('single.html'));

      expect(await relay.resolve(BASE, 'https://anime1.me/101')).toEqual({
        type: 'single',
        id: '101',
        title: '測試番劇 [01]',
        category: '1234',
        url: `${BASE}/v/101`,
      });
    });

    it('rejects upstream pages that are neither', async () => {
      mockFetch.mockResolvedValueOnce(htmlResponse('home.html'));
      await expect(relay.resolve(BASE, 'https://anime1.me/')).rejects.toBeInstanceOf(UnknownUrlTypeError);
    });
  });

  describe('getPlaylist', () => {
    it('defaults to m3u8', async () => {
      mockFetch.mockResolvedValueOnce(htmlResponse('category-numbered.html'));

      const info = await relay.getPlaylist(BASE, '1234');

      expect(info.type).toBe('m3u8');
      expect(info.content.split('\n').filter((line) => line.startsWith(`${BASE}/v/`))).toEqual([
        `${BASE}/v/101`,
        `${BASE}/v/102`,
        `${BASE}/v/103`,
      ]);
    });

    it('rejects an unknown format before fetching', async () => {
      await expect(relay.getPlaylist(BASE, '1234', 'wpl')).rejects.toBeInstanceOf(UnsupportedPlaylistFormatError);
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('reports a category id that leads nowhere', async () => {
      mockFetch.mockResolvedValueOnce(htmlResponse('home.html'));
      await expect(relay.getPlaylist(BASE, '9999', 'dpl')).rejects.toBeInstanceOf(UnknownCategoryError);
    });
  });

  describe('openVideo', () => {
    it('resolves once and reuses the cached resolution', async () => {
      mockFetch
        .mockResolvedValueOnce(htmlResponse('single.html'))
        .mockResolvedValueOnce(apiResponse())
        .mockResolvedValueOnce(videoResponse())
        .mockResolvedValueOnce(videoResponse());

      const first = await relay.openVideo('101', 'bytes=0-');
      first.close();
      const second = await relay.openVideo('101', 'bytes=0-');
      second.close();

      expect(first.status).toBe(206);
      expect(second.headers['Content-Range']).toBe('bytes 0-2/3');
      expect(calledUrls()).toEqual([
        'https://anime1.me/101',
        'https://v.anime1.me/api',
        BACKING_URL,
        BACKING_URL,
      ]);
      expect(relay.stats()).toMatchObject({ size: 1, hits: 1, resolutions: 1 });
    });

    it('resolves again when a cached URL is refused', async () => {
      mockFetch
        .mockResolvedValueOnce(htmlResponse('single.html'))
        .mockResolvedValueOnce(apiResponse())
        .mockResolvedValueOnce(videoResponse(200))
        .mockResolvedValueOnce(new Response('', { status: 403 }))
        .mockResolvedValueOnce(htmlResponse('single.html'))
        .mockResolvedValueOnce(apiResponse())
        .mockResolvedValueOnce(videoResponse());

      (await relay.openVideo('101')).close();
      const stream = await relay.openVideo('101', 'bytes=0-');
      stream.close();

      expect(stream.status).toBe(206);
      expect(mockFetch).toHaveBeenCalledTimes(7);
      expect(relay.stats().resolutions).toBe(2);
    });

    it('does not retry a refusal of a fresh resolution', async () => {
      mockFetch
        .mockResolvedValueOnce(htmlResponse('single.html'))
        .mockResolvedValueOnce(apiResponse())
        .mockResolvedValueOnce(new Response('', { status: 403 }));

      await expect(relay.openVideo('101')).rejects.toBeInstanceOf(UpstreamError);
      expect(mockFetch).toHaveBeenCalledTimes(3);
    });

    it('reports a post id that is not a post', async () => {
      mockFetch.mockResolvedValueOnce(htmlResponse('home.html'));
      await expect(relay.openVideo('1')).rejects.toBeInstanceOf(UnknownVideoError);
    });
  });

  it('drops cached resolutions and the session on reset', async () => {
    mockFetch
      .mockResolvedValueOnce(htmlResponse('single.html'))
      .mockResolvedValueOnce(apiResponse())
      .mockResolvedValueOnce(videoResponse());

    (await relay.openVideo('101')).close();
    expect(relay.stats()).toMatchObject({ size: 1, sessionId: 1 });

    relay.reset();

    expect(relay.stats()).toMatchObject({ size: 0, sessionId: null });
  });
});
