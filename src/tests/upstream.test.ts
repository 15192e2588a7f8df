/**
 * Tests for the anime1.me upstream client
 * Network calls go through a mocked undici fetch; responses are real undici Responses.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const { agents } = vi.hoisted(() => {
  const agents: Array<{ closed: boolean }> = [];
  return { agents };
});

vi.mock('undici', async (importOriginal) => {
  const actual = await importOriginal<typeof import('undici')>();
  class MockAgent {
    closed = false;
    constructor() {
      agents.push(this);
    }
    async close(): Promise<void> {
      this.closed = true;
    }
  }
  return { ...actual, fetch: vi.fn(), Agent: MockAgent };
});

import { fetch, Response } from 'undici';
import { UpstreamClient, isUpstreamUrl } from '../core/upstream.js';
import {
  InvalidUrlError,
  MalformedPageError,
  RelayError,
  UpstreamError,
  UpstreamUnavailableError,
} from '../types.js';
import { loadFixture, makeVideo } from './helpers.js';

const mockFetch = vi.mocked(fetch);

const RESOLVE_BODY = JSON.stringify({ s: [{ src: '//cdn.example.test/v/101.mp4?sig=test-signature', type: 'video/mp4' }] });
const RESOLVE_COOKIES: Array<[string, string]> = [
  ['set-cookie', 'e=1900000000; Path=/'],
  ['set-cookie', 'p=test-p; Path=/'],
  ['set-cookie', 'h=test-h; Path=/; HttpOnly'],
];

function htmlResponse(name: string): Response {
  return new Response(loadFixture(name), {
    status: 200,
    headers: { 'content-type': 'text/html; charset=UTF-8' },
  });
}

function apiResponse(body = RESOLVE_BODY, cookies = RESOLVE_COOKIES): Response {
  return new Response(body, {
    status: 200,
    headers: [['content-type', 'application/json'], ...cookies],
  });
}

function requestInit(call: number) {
  return mockFetch.mock.calls[call][1];
}

describe('isUpstreamUrl', () => {
  it('accepts the upstream host and its subdomains', () => {
    expect(isUpstreamUrl('https://anime1.me/?cat=1234')).toBe(true);
    expect(isUpstreamUrl('http://anime1.me/101')).toBe(true);
    expect(isUpstreamUrl('https://v.anime1.me/api')).toBe(true);
  });

  it('rejects other hosts, schemes and garbage', () => {
    expect(isUpstreamUrl('https://example.test/?cat=1234')).toBe(false);
    expect(isUpstreamUrl('https://notanime1.me/101')).toBe(false);
    expect(isUpstreamUrl('https://anime1.me.example.test/101')).toBe(false);
    expect(isUpstreamUrl('ftp://anime1.me/101')).toBe(false);
    expect(isUpstreamUrl('not a url')).toBe(false);
  });
});

describe('UpstreamClient', () => {
  let client: UpstreamClient;

  beforeEach(() => {
    vi.clearAllMocks();
    agents.length = 0;
    client = new UpstreamClient({ timeoutMs: 1000 });
  });

  describe('pages', () => {
    it('rejects a foreign URL before any network I/O', async () => {
      await expect(client.fetchPostsOrCategory('https://example.test/?cat=1234')).rejects.toBeInstanceOf(InvalidUrlError);
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('fetches and parses a category page', async () => {
      mockFetch.mockResolvedValueOnce(htmlResponse('category-numbered.html'));

      const category = await client.fetchCategory('1234');

      expect(category?.posts.map((p) => p.id)).toEqual(['101', '102', '103']);
      expect(mockFetch.mock.calls[0][0]).toBe('https://anime1.me/?cat=1234');
      expect(requestInit(0)?.method).toBe('GET');
      expect(requestInit(0)?.headers).toMatchObject({
        'User-Agent': expect.stringContaining('Chrome/118'),
        Referer: 'https://anime1.me/',
      });
      expect(requestInit(0)?.dispatcher).toBe(agents[0]);
    });

    it('returns null when the category URL is not a category page', async () => {
      mockFetch.mockResolvedValueOnce(htmlResponse('home.html'));
      expect(await client.fetchCategory('1234')).toBeNull();
    });

    it('fetches a single post by id', async () => {
      mockFetch.mockResolvedValueOnce(htmlResponse('single.html'));

      const post = await client.fetchPost('101');

      expect(post?.title).toBe('測試番劇 [01]');
      expect(mockFetch.mock.calls[0][0]).toBe('https://anime1.me/101');
    });

    it('classifies any upstream page', async () => {
      mockFetch.mockResolvedValueOnce(htmlResponse('single.html'));
      const page = await client.fetchPostsOrCategory('https://anime1.me/101');
      expect(page.kind).toBe('single');
    });

    it('surfaces a non-2xx status as UpstreamError', async () => {
      mockFetch.mockResolvedValueOnce(new Response('missing', { status: 404 }));

      const error = await client.fetchPost('999').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({ status: 404, message: 'HTTP 404: Not Found' });
    });

    it('translates DNS failures into UpstreamUnavailableError', async () => {
      const cause = Object.assign(new Error('getaddrinfo ENOTFOUND anime1.me'), { code: 'ENOTFOUND' });
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed', { cause }));

      const error = await client.fetchCategory('1234').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamUnavailableError);
      expect(error).toMatchObject({ message: 'DNS resolution failed for anime1.me', timedOut: false });
    });

    it('times out a request that never answers', async () => {
      client = new UpstreamClient({ timeoutMs: 20 });
      mockFetch.mockImplementationOnce((_url, init) => new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new DOMException('This operation was aborted', 'AbortError')));
      }));

      const error = await client.fetchCategory('1234').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamUnavailableError);
      expect(error).toMatchObject({ code: 'TIMEOUT', timedOut: true });
    });
  });

  describe('resolveVideo', () => {
    it('posts the token and returns the signed URL with its expiry', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse());

      const video = await client.resolveVideo('{"c":"1234","e":"101"}');

      expect(video).toEqual({
        backingUrl: 'https://cdn.example.test/v/101.mp4?sig=test-signature',
        mediaType: 'video/mp4',
        sessionCookies: ['e=1900000000', 'p=test-p', 'h=test-h'],
        expiresAt: 1899999995,
      });
      expect(mockFetch.mock.calls[0][0]).toBe('https://v.anime1.me/api');
      expect(requestInit(0)?.method).toBe('POST');
      expect(requestInit(0)?.body).toBe('d=%7B%22c%22%3A%221234%22%2C%22e%22%3A%22101%22%7D');
      expect(requestInit(0)?.headers).toMatchObject({
        'Content-Type': 'application/x-www-form-urlencoded',
        Origin: 'https://anime1.me',
      });
    });

    it('keeps an absolute source URL as is', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse(JSON.stringify({ s: [{ src: 'https://cdn.example.test/a.mp4', type: 'video/mp4' }] })));
      const video = await client.resolveVideo('token');
      expect(video.backingUrl).toBe('https://cdn.example.test/a.mp4');
    });

    it('rejects a response without the expiry cookie', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse(RESOLVE_BODY, [['set-cookie', 'p=test-p']]));
      await expect(client.resolveVideo('token')).rejects.toThrow('Resolution API response has no expiry cookie');
    });

    it('rejects a response without a source', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse(JSON.stringify({ s: [] })));
      await expect(client.resolveVideo('token')).rejects.toBeInstanceOf(MalformedPageError);
    });

    it('rejects a response that is not JSON', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse('<html>'));
      await expect(client.resolveVideo('token')).rejects.toThrow('Resolution API returned invalid JSON');
    });

    it('resolves a post id through its page', async () => {
      mockFetch
        .mockResolvedValueOnce(htmlResponse('single.html'))
        .mockResolvedValueOnce(apiResponse());

      const video = await client.resolveByPostId('101');

      expect(video?.expiresAt).toBe(1899999995);
      expect(requestInit(1)?.body).toBe('d=%7B%22c%22%3A%221234%22%2C%22e%22%3A%22101%22%7D');
    });

    it('returns null for a post id that is not a post page', async () => {
      mockFetch.mockResolvedValueOnce(htmlResponse('home.html'));
      expect(await client.resolveByPostId('1')).toBeNull();
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('sends session cookies back to the upstream host', async () => {
      mockFetch
        .mockResolvedValueOnce(apiResponse())
        .mockResolvedValueOnce(apiResponse());

      await client.resolveVideo('token');
      await client.resolveVideo('token');

      expect(requestInit(1)?.headers).toMatchObject({ Cookie: 'e=1900000000; p=test-p; h=test-h' });
    });
  });

  describe('openVideo', () => {
    it('relays Range and If-Range with the resolution cookies', async () => {
      mockFetch.mockResolvedValueOnce(new Response('partial', { status: 206 }));

      const { response, release } = await client.openVideo(makeVideo(), 'bytes=100-', '"etag-1"');
      release();

      expect(response.status).toBe(206);
      expect(mockFetch.mock.calls[0][0]).toBe('https://cdn.example.test/video/101.mp4?sig=test-signature');
      expect(requestInit(0)?.headers).toMatchObject({
        Range: 'bytes=100-',
        'If-Range': '"etag-1"',
        Cookie: 'e=1900000000; p=test-p; h=test-h',
      });
    });

    it('sends no Range header when none was given', async () => {
      mockFetch.mockResolvedValueOnce(new Response('full', { status: 200 }));

      const { release } = await client.openVideo(makeVideo());
      release();

      expect(requestInit(0)?.headers).not.toHaveProperty('Range');
      expect(requestInit(0)?.headers).not.toHaveProperty('If-Range');
    });

    it('surfaces a refused backing URL as UpstreamError', async () => {
      mockFetch.mockResolvedValueOnce(new Response('', { status: 403 }));
      await expect(client.openVideo(makeVideo())).rejects.toMatchObject({ status: 403 });
    });
  });

  describe('sessions', () => {
    it('starts a fresh session after reset', async () => {
      mockFetch.mockImplementation(async () => htmlResponse('home.html'));

      await client.fetchPage('https://anime1.me/');
      expect(client.sessionId).toBe(1);
      client.reset();
      expect(client.sessionId).toBeNull();
      expect(agents[0].closed).toBe(true);

      await client.fetchPage('https://anime1.me/');
      expect(client.sessionId).toBe(2);
      expect(requestInit(1)?.dispatcher).toBe(agents[1]);
    });

    it('keeps a retired session open until its video stream is released', async () => {
      mockFetch.mockResolvedValueOnce(new Response('data', { status: 200 }));

      const { release } = await client.openVideo(makeVideo());
      client.reset();
      expect(agents[0].closed).toBe(false);

      release();
      release();
      expect(agents[0].closed).toBe(true);
    });

    it('refuses calls once closed', async () => {
      await client.close();
      await expect(client.fetchCategory('1234')).rejects.toBeInstanceOf(RelayError);
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });
});
