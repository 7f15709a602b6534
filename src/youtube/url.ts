/**
 * Video id extraction from the URL shapes people paste:
 * - https://youtu.be/<id>?si=...
 * - https://www.youtube.com/watch?v=<id>&t=42
 * - https://www.youtube.com/shorts/<id>, https://www.youtube.com/embed/<id>
 * - a bare 11-character id
 */

const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;

export const WATCH_URL_BASE = 'https://www.youtube.com/watch';

function lastPathSegment(input: string): string {
  const segments = input.split('/');
  return segments[segments.length - 1].split('?')[0];
}

function queryParam(input: string, name: string): string | null {
  const queryStart = input.indexOf('?');
  if (queryStart === -1) {
    return null;
  }
  const query = input.slice(queryStart + 1).split('#')[0];
  return new URLSearchParams(query).get(name);
}

/**
 * Extract the video id, or null when the input has none of the known shapes.
 * Pure string parsing; the id found in a URL is not re-validated.
 */
export function extractVideoId(input: string): string | null {
  let id: string | null;

  if (input.includes('youtu.be')) {
    id = lastPathSegment(input);
  } else if (input.includes('youtube.com/watch')) {
    id = queryParam(input, 'v');
  } else if (input.includes('youtube.com/shorts') || input.includes('youtube.com/embed')) {
    id = lastPathSegment(input);
  } else if (VIDEO_ID_PATTERN.test(input)) {
    id = input;
  } else {
    id = null;
  }

  return id ? id : null;
}

export function buildWatchUrl(videoId: string): string {
  return `${WATCH_URL_BASE}?v=${encodeURIComponent(videoId)}`;
}
