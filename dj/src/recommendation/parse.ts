// Turns free-form model output into validated track candidates.

import { z } from 'zod';
import { ParseFailure } from '../errors.js';
import { fail, ok, type Result, type TrackCandidate } from '../types.js';

export const MAX_CANDIDATES = 10;

export interface Recommendation {
  /** Ranked, best first. */
  candidates: TrackCandidate[];
  narrative?: string;
  /** Index into `candidates` of the option the model marked as its own pick. */
  selectedIndex?: number;
}

const itemSchema = z.object({
  track_name: z.string().trim().min(1),
  artist_name: z.string().trim().min(1),
  intro: z.string().nullish(),
});

const selectionSchema = z.object({ selected_index: z.number().int().positive() });

const NUMBERED_LINE = /^\s*\d+[.)]\s+(.+)\s+by\s+(.+?)\s*$/i;

export function parseRecommendation(
  text: string | null | undefined,
  limit: number = MAX_CANDIDATES,
): Result<Recommendation, ParseFailure> {
  const raw = (text ?? '').trim();
  if (!raw) {
    return fail(new ParseFailure('Empty recommendation response', raw));
  }

  const json = extractJson(raw);
  if (json !== undefined) {
    return fromJson(json, raw, limit);
  }

  const listed = fromNumberedLines(raw);
  if (listed.length > 0) {
    return ok({ candidates: listed.slice(0, limit) });
  }
  return fail(new ParseFailure('Recommendation response is neither JSON nor a numbered list', raw));
}

function fromJson(json: unknown, raw: string, limit: number): Result<Recommendation, ParseFailure> {
  const items = toItems(json);
  const selection = selectionSchema.safeParse(json);
  // selected_index counts the raw options from 1; invalid options are skipped below.
  const selectedItem = selection.success ? selection.data.selected_index - 1 : -1;
  const candidates: TrackCandidate[] = [];
  let narrative: string | undefined;
  let selectedIndex: number | undefined;

  for (const [index, item] of items.entries()) {
    const parsed = itemSchema.safeParse(item);
    if (!parsed.success) continue;
    if (index === selectedItem) selectedIndex = candidates.length;
    candidates.push({ title: parsed.data.track_name, artist: parsed.data.artist_name });
    const intro = parsed.data.intro?.trim();
    if (intro) narrative ??= intro;
    if (candidates.length >= limit) break;
  }

  if (candidates.length === 0) {
    return fail(new ParseFailure('Recommendation response has no item with track_name and artist_name', raw));
  }
  const recommendation: Recommendation = { candidates };
  if (narrative !== undefined) recommendation.narrative = narrative;
  if (selectedIndex !== undefined) recommendation.selectedIndex = selectedIndex;
  return ok(recommendation);
}

function toItems(json: unknown): unknown[] {
  if (Array.isArray(json)) return json;
  if (typeof json === 'object' && json !== null) {
    if ('options' in json && Array.isArray(json.options)) return json.options;
    return [json];
  }
  return [];
}

function extractJson(raw: string): unknown {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(raw);
  const body = fenced?.[1]?.trim() ?? raw;

  const attempts = [body, outermostJson(body)];
  for (const attempt of attempts) {
    if (!attempt) continue;
    const parsed = tryParse(attempt);
    if (parsed !== undefined) return parsed;
    // Pseudo-JSON with single quotes is common from chat models.
    const requoted = tryParse(attempt.replace(/'/g, '"'));
    if (requoted !== undefined) return requoted;
  }
  return undefined;
}

function outermostJson(text: string): string | undefined {
  const start = text.search(/[[{]/);
  if (start < 0) return undefined;
  const closer = text[start] === '[' ? ']' : '}';
  const end = text.lastIndexOf(closer);
  return end > start ? text.slice(start, end + 1) : undefined;
}

function tryParse(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return typeof value === 'object' && value !== null ? value : undefined;
  } catch {
    return undefined;
  }
}

function fromNumberedLines(raw: string): TrackCandidate[] {
  const candidates: TrackCandidate[] = [];
  for (const line of raw.split('\n')) {
    const match = NUMBERED_LINE.exec(line);
    if (!match) continue;
    const title = stripQuotes(match[1] ?? '');
    const artist = stripQuotes(match[2] ?? '');
    if (title && artist) {
      candidates.push({ title, artist });
    }
  }
  return candidates;
}

function stripQuotes(value: string): string {
  return value.trim().replace(/^["'“”*]+|["'“”*]+$/g, '').trim();
}
