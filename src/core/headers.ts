/**
 * Fixed browser identity for every upstream call.
 *
 * The upstream serves different markup (or refuses) for generic client
 * headers, so these values are part of the contract, not decoration.
 */

export const UPSTREAM_HOST = 'anime1.me';
export const UPSTREAM_URL = `https://${UPSTREAM_HOST}`;
export const RESOLVE_API_URL = `https://v.${UPSTREAM_HOST}/api`;

export const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/118.0.0.0 Safari/537.36';

const ACCEPT_LANGUAGE = 'zh-CN,zh;q=0.9,en;q=0.8';
const REFERER = `${UPSTREAM_URL}/`;

export function getPageHeaders(): Record<string, string> {
  return {
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,image/apng,*/*;q=0.8,application/signed-exchange;v=b3;q=0.7',
    'Accept-Encoding': 'gzip, deflate',
    'Accept-Language': ACCEPT_LANGUAGE,
    'Cache-Control': 'max-age=0',
    'Referer': REFERER,
    'User-Agent': USER_AGENT,
  };
}

export function getApiHeaders(): Record<string, string> {
  return {
    'Accept': '*/*',
    'Accept-Encoding': 'gzip, deflate',
    'Accept-Language': ACCEPT_LANGUAGE,
    'Cache-Control': 'max-age=0',
    'Pragma': 'no-cache',
    'Content-Type': 'application/x-www-form-urlencoded',
    'Origin': UPSTREAM_URL,
    'Referer': REFERER,
    'User-Agent': USER_AGENT,
  };
}

/**
 * Headers for the backing video request. `Range` / `If-Range` are forwarded
 * verbatim and only when the client sent them.
 */
export function getVideoHeaders(range?: string, ifRange?: string): Record<string, string> {
  const headers: Record<string, string> = {
    'Accept': '*/*',
    'Accept-Encoding': 'identity;q=1, *;q=0',
    'Accept-Language': ACCEPT_LANGUAGE,
    'Referer': REFERER,
    'User-Agent': USER_AGENT,
  };
  if (range !== undefined) headers['Range'] = range;
  if (ifRange !== undefined) headers['If-Range'] = ifRange;
  return headers;
}
