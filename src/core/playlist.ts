/**
 * Playlist rendering for a category.
 *
 *  - m3u8      : `#EXTM3U` with one `#EXTINF` / URI pair per post
 *  - dpl       : Daum/PotPlayer playlist listing every post
 *  - dpl_ext   : Daum/PotPlayer playlist that points at the m3u8 endpoint
 *  - xspf      : XSPF with one track per post
 *  - xspf_ext  : XSPF with a single track pointing at the category endpoint
 *
 * Output is a pure function of its input.
 */

import { XMLBuilder } from 'fast-xml-parser';
import type { Category, PlaylistInfo, PlaylistType } from '../types.js';
import { PLAYLIST_TYPES, UnsupportedPlaylistFormatError } from '../types.js';

const XSPF_NAMESPACE = 'http://xspf.org/ns/0/';

const xmlBuilder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true,
});

interface XspfTrack {
  location: string;
  title: string;
}

export function trimBaseUri(baseUri: string): string {
  return baseUri.replace(/\/+$/, '');
}

export function videoUrl(baseUri: string, postId: string): string {
  return `${trimBaseUri(baseUri)}/v/${postId}`;
}

export function categoryUrl(baseUri: string, categoryId: string): string {
  return `${trimBaseUri(baseUri)}/c/${categoryId}`;
}

export function playlistUrl(baseUri: string, categoryId: string, type: PlaylistType): string {
  return `${categoryUrl(baseUri, categoryId)}?playlist=${type}`;
}

export function playlistUrls(baseUri: string, categoryId: string): Record<PlaylistType, string> {
  return {
    m3u8: playlistUrl(baseUri, categoryId, 'm3u8'),
    dpl: playlistUrl(baseUri, categoryId, 'dpl'),
    dpl_ext: playlistUrl(baseUri, categoryId, 'dpl_ext'),
    xspf: playlistUrl(baseUri, categoryId, 'xspf'),
    xspf_ext: playlistUrl(baseUri, categoryId, 'xspf_ext'),
  };
}

export function isPlaylistType(value: string): value is PlaylistType {
  return PLAYLIST_TYPES.some((type) => type === value);
}

export function parsePlaylistType(name: string): PlaylistType {
  const normalized = name.trim().toLowerCase();
  if (!isPlaylistType(normalized)) {
    throw new UnsupportedPlaylistFormatError(name);
  }
  return normalized;
}

function lines(...rows: string[]): string {
  return rows.map((row) => `${row}\n`).join('');
}

function buildM3u8(baseUri: string, category: Category): string {
  const rows = ['#EXTM3U'];
  for (const post of category.posts) {
    rows.push(`#EXTINF:-1,${post.title}`, videoUrl(baseUri, post.id));
  }
  return lines(...rows);
}

const DPL_HEADER = ['DAUMPLAYLIST', 'topindex=0', 'saveplaypos=0'];

function buildDpl(baseUri: string, category: Category): string {
  const rows = [...DPL_HEADER];
  category.posts.forEach((post, i) => {
    rows.push(`${i + 1}*title*${post.title}`, `${i + 1}*file*${videoUrl(baseUri, post.id)}`);
  });
  return lines(...rows);
}

function buildDplExt(baseUri: string, category: Category): string {
  return lines(...DPL_HEADER, `extplaylist=${playlistUrl(baseUri, category.id, 'm3u8')}`);
}

function buildXspf(title: string, tracks: XspfTrack[]): string {
  const xml: string = xmlBuilder.build({
    '?xml': { '@_version': '1.0', '@_encoding': 'UTF-8' },
    playlist: {
      '@_version': '1',
      '@_xmlns': XSPF_NAMESPACE,
      title,
      trackList: { track: tracks },
    },
  });
  return xml;
}

const RENDERERS: Record<PlaylistType, {
  mediaType: string;
  extension: string;
  render: (baseUri: string, category: Category) => string;
}> = {
  m3u8: { mediaType: 'application/x-mpegURL', extension: 'm3u8', render: buildM3u8 },
  dpl: { mediaType: 'text/plain', extension: 'dpl', render: buildDpl },
  dpl_ext: { mediaType: 'text/plain', extension: 'dpl', render: buildDplExt },
  xspf: {
    mediaType: 'application/xspf+xml',
    extension: 'xspf',
    render: (baseUri, category) => buildXspf(
      category.title,
      category.posts.map((post) => ({ location: videoUrl(baseUri, post.id), title: post.title })),
    ),
  },
  xspf_ext: {
    mediaType: 'application/xspf+xml',
    extension: 'xspf',
    render: (baseUri, category) => buildXspf(
      category.title,
      [{ location: categoryUrl(baseUri, category.id), title: category.title }],
    ),
  },
};

export function buildPlaylist(type: PlaylistType, baseUri: string, category: Category): PlaylistInfo {
  const renderer = RENDERERS[type];
  return {
    type,
    content: renderer.render(baseUri, category),
    mediaType: renderer.mediaType,
    fileName: `${category.title}.${renderer.extension}`,
  };
}
