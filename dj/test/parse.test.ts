import { describe, it, expect } from 'vitest';
import { ParseFailure } from '../src/errors.js';
import { MAX_CANDIDATES, parseRecommendation } from '../src/recommendation/parse.js';

function candidatesOf(text: string) {
  const result = parseRecommendation(text);
  if (!result.success) throw result.error;
  return result.data;
}

describe('parseRecommendation', () => {
  it('reads a single JSON object with an intro', () => {
    expect(candidatesOf('{"track_name": "Seville", "artist_name": "Pinback", "intro": "Up next"}')).toEqual({
      candidates: [{ title: 'Seville', artist: 'Pinback' }],
      narrative: 'Up next',
    });
  });

  it('accepts an item whose intro is null or blank', () => {
    expect(candidatesOf('{"track_name": "Seville", "artist_name": "Pinback", "intro": null}')).toEqual({
      candidates: [{ title: 'Seville', artist: 'Pinback' }],
    });
    expect(candidatesOf('{"track_name": "Seville", "artist_name": "Pinback", "intro": "  "}')).toEqual({
      candidates: [{ title: 'Seville', artist: 'Pinback' }],
    });
  });

  it('takes the narrative from the first item with a non-blank intro', () => {
    const text = JSON.stringify([
      { track_name: 'Seville', artist_name: 'Pinback', intro: '' },
      { track_name: 'Penelope', artist_name: 'Pinback', intro: ' Second up ' },
    ]);
    expect(candidatesOf(text).narrative).toBe('Second up');
  });

  it('keeps the order of a JSON array', () => {
    const text = JSON.stringify([
      { track_name: 'Seville', artist_name: 'Pinback' },
      { track_name: 'Penelope', artist_name: 'Pinback' },
    ]);
    expect(candidatesOf(text).candidates).toEqual([
      { title: 'Seville', artist: 'Pinback' },
      { title: 'Penelope', artist: 'Pinback' },
    ]);
  });

  it('reads an options list', () => {
    const text = '{"options": [{"track_name": "Seville", "artist_name": "Pinback"}], "selected_index": 0}';
    expect(candidatesOf(text).candidates).toEqual([{ title: 'Seville', artist: 'Pinback' }]);
  });

  it('maps a 1-based selected_index onto the kept options', () => {
    const text = JSON.stringify({
      options: [
        { track_name: 'Broken', artist_name: '' },
        { track_name: 'Seville', artist_name: 'Pinback' },
        { track_name: 'Penelope', artist_name: 'Pinback' },
      ],
      selected_index: 3,
    });
    expect(candidatesOf(text)).toEqual({
      candidates: [
        { title: 'Seville', artist: 'Pinback' },
        { title: 'Penelope', artist: 'Pinback' },
      ],
      selectedIndex: 1,
    });
  });

  it('ignores a selected_index pointing at a dropped option', () => {
    const text = JSON.stringify({
      options: [
        { track_name: 'Broken', artist_name: '' },
        { track_name: 'Seville', artist_name: 'Pinback' },
      ],
      selected_index: 1,
    });
    expect(candidatesOf(text).selectedIndex).toBeUndefined();
  });

  it('unwraps a fenced code block', () => {
    const text = 'Here you go:\n```json\n{"track_name": "Seville", "artist_name": "Pinback"}\n```\nEnjoy!';
    expect(candidatesOf(text).candidates).toEqual([{ title: 'Seville', artist: 'Pinback' }]);
  });

  it('finds JSON surrounded by prose', () => {
    const text = 'Sure! {"track_name": "Seville", "artist_name": "Pinback"} Have fun.';
    expect(candidatesOf(text).candidates).toEqual([{ title: 'Seville', artist: 'Pinback' }]);
  });

  it('accepts single-quoted pseudo JSON', () => {
    const text = "{'track_name': 'Seville', 'artist_name': 'Pinback'}";
    expect(candidatesOf(text).candidates).toEqual([{ title: 'Seville', artist: 'Pinback' }]);
  });

  it('falls back to numbered lines', () => {
    const text = 'Try these:\n1. Seville by Pinback\n2) "Good to Sea" by Pinback';
    expect(candidatesOf(text)).toEqual({
      candidates: [
        { title: 'Seville', artist: 'Pinback' },
        { title: 'Good to Sea', artist: 'Pinback' },
      ],
    });
  });

  it('drops items without a usable artist', () => {
    const text = JSON.stringify([
      { track_name: 'Seville', artist_name: '  ' },
      { track_name: 'Penelope', artist_name: 'Pinback' },
    ]);
    expect(candidatesOf(text).candidates).toEqual([{ title: 'Penelope', artist: 'Pinback' }]);
  });

  it('caps the number of candidates', () => {
    const items = Array.from({ length: 15 }, (_, i) => ({ track_name: `Song ${i}`, artist_name: 'Band' }));
    expect(candidatesOf(JSON.stringify(items)).candidates).toHaveLength(MAX_CANDIDATES);
  });

  it('honours a smaller limit for JSON and numbered lines', () => {
    const items = Array.from({ length: 8 }, (_, i) => ({ track_name: `Song ${i}`, artist_name: 'Band' }));
    const json = parseRecommendation(JSON.stringify(items), 5);
    expect(json.success && json.data.candidates).toHaveLength(5);
    const lines = parseRecommendation('1. One by Band\n2. Two by Band\n3. Three by Band', 2);
    expect(lines.success && lines.data.candidates).toEqual([
      { title: 'One', artist: 'Band' },
      { title: 'Two', artist: 'Band' },
    ]);
  });

  it('returns ParseFailure when artist_name is missing', () => {
    const result = parseRecommendation('{"track_name": "Seville"}');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ParseFailure);
      expect(result.error.code).toBe('PARSE_FAILURE');
    }
  });

  it('returns ParseFailure for empty or free text', () => {
    expect(parseRecommendation('').success).toBe(false);
    expect(parseRecommendation(null).success).toBe(false);
    expect(parseRecommendation("I don't know").success).toBe(false);
  });
});
