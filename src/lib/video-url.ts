import type { ExtractionMode, PlaylistRef, VideoRef } from '@/types/video';

const VIDEO_ID_PATTERN = /^[a-zA-Z0-9_-]{11}$/;
const PLAYLIST_ID_PATTERN = /^[a-zA-Z0-9_-]{10,}$/;
const YOUTUBE_HOSTS = new Set(['youtube.com', 'm.youtube.com', 'music.youtube.com']);

export function isValidVideoId(value: string): boolean {
  return VIDEO_ID_PATTERN.test(value);
}

/** Accepts watch, shorts, embed, v/, youtu.be URLs and bare 11-character ids. */
export function extractVideoId(urlOrId: string): string | null {
  const trimmed = urlOrId.trim();
  if (isValidVideoId(trimmed)) {
    return trimmed;
  }

  let parsed: URL;
  try {
    parsed = new URL(/^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`);
  } catch {
    return null;
  }

  const host = parsed.hostname.replace(/^www\./, '').toLowerCase();
  if (host === 'youtu.be') {
    const id = parsed.pathname.slice(1).split('/')[0] ?? '';
    return isValidVideoId(id) ? id : null;
  }

  if (!YOUTUBE_HOSTS.has(host)) {
    return null;
  }

  const fromQuery = parsed.searchParams.get('v');
  if (fromQuery && isValidVideoId(fromQuery)) {
    return fromQuery;
  }

  const match = parsed.pathname.match(/^\/(?:embed|shorts|v|live)\/([a-zA-Z0-9_-]{11})(?:\/|$)/);
  return match?.[1] ?? null;
}

export function extractPlaylistId(url: string): string | null {
  const match = url.trim().match(/[?&]list=([a-zA-Z0-9_-]+)/);
  const id = match?.[1];
  return id && PLAYLIST_ID_PATTERN.test(id) ? id : null;
}

export function toPlaylistRef(url: string): PlaylistRef | null {
  const playlistId = extractPlaylistId(url);
  if (!playlistId) {
    return null;
  }

  return {
    playlistId,
    url: `https://www.youtube.com/playlist?list=${playlistId}`
  };
}

export function createVideoRef(
  videoId: string,
  opts: { language?: string; mode?: ExtractionMode } = {}
): VideoRef {
  const language = opts.language?.trim();
  return Object.freeze({
    videoId,
    ...(language ? { language } : {}),
    ...(opts.mode ? { mode: opts.mode } : {})
  });
}

export function buildWatchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

export function buildTimestampedUrl(videoId: string, seconds: number): string {
  return `https://www.youtube.com/watch?v=${videoId}&t=${Math.floor(seconds)}s`;
}
