// Title/artist normalization shared by the resolver and the repeat guard.

import type { TrackCandidate } from '../types.js';

export function normalizeTitle(raw: string): string {
  let s = (raw || '').toLowerCase();
  // remove content in brackets and parentheses
  s = s.replace(/\([^)]*\)|\[[^\]]*\]|\{[^}]*\}/g, ' ');
  // remove trailing " - 2011 Remaster", " - Radio Edit" style segments
  s = s.replace(/\s[-–—]\s.*\b(remaster(ed)?|remix|rework|edit|mix|version|live|mono|stereo|demo)\b.*$/g, ' ');
  // remove featuring segments (token + following words)
  s = s.replace(/\b(featuring|feat\.?|ft\.)\s+[\w\s.'-]+/g, ' ');
  // collapse whitespace and punctuation noise
  s = s.replace(/[^\p{L}\p{N}\s]+/gu, ' ').replace(/\s+/g, ' ').trim();
  return s;
}

export function normalizeArtist(raw: string): string {
  let s = (raw || '').toLowerCase();
  s = s.replace(/^the\s+/, '');
  s = s.replace(/[^\p{L}\p{N}\s]+/gu, ' ').replace(/\s+/g, ' ').trim();
  return s;
}

/** Equal, or one contains the other as whole words ("home" never matches "homesick"). */
function looselyEqual(a: string, b: string): boolean {
  if (!a || !b) return false;
  const left = ` ${a} `;
  const right = ` ${b} `;
  return left.includes(right) || right.includes(left);
}

export function titlesMatch(a: string, b: string): boolean {
  return looselyEqual(normalizeTitle(a), normalizeTitle(b));
}

export function artistsMatch(a: string, b: string): boolean {
  return looselyEqual(normalizeArtist(a), normalizeArtist(b));
}

/** Same song by the same artist, ignoring edition and featuring noise. */
export function sameSong(a: TrackCandidate, b: TrackCandidate): boolean {
  return normalizeTitle(a.title) === normalizeTitle(b.title) && artistsMatch(a.artist, b.artist);
}
