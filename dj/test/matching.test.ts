import { describe, it, expect } from 'vitest';
import { artistsMatch, normalizeArtist, normalizeTitle, sameSong, titlesMatch } from '../src/autoplay/matching.js';

describe('normalizeTitle', () => {
  it('strips edition brackets and suffixes', () => {
    expect(normalizeTitle('Seville (2011 Remaster)')).toBe('seville');
    expect(normalizeTitle('Seville - 2011 Remaster')).toBe('seville');
    expect(normalizeTitle('Seville [Radio Edit]')).toBe('seville');
    expect(normalizeTitle('Walk on Water feat. Someone')).toBe('walk on water');
  });

  it('collapses punctuation', () => {
    expect(normalizeTitle("Don't Stop!")).toBe('don t stop');
  });
});

describe('normalizeArtist', () => {
  it('drops a leading article', () => {
    expect(normalizeArtist('The National')).toBe('national');
  });
});

describe('matching', () => {
  it('matches titles loosely', () => {
    expect(titlesMatch('Seville', 'Seville - Live')).toBe(true);
    expect(titlesMatch('Seville', 'Penelope')).toBe(false);
  });

  it('only matches contained titles on whole words', () => {
    expect(titlesMatch('Home', 'Homesick')).toBe(false);
    expect(titlesMatch('Home', 'Take Me Home')).toBe(true);
    expect(artistsMatch('Pinback', 'Pinbacks')).toBe(false);
  });

  it('accepts one artist out of a joined credit', () => {
    expect(artistsMatch('Pinback, Someone Else', 'Pinback')).toBe(true);
    expect(artistsMatch('The National', 'National')).toBe(true);
    expect(artistsMatch('Pinback', 'Slint')).toBe(false);
  });

  it('treats editions of a song as the same song', () => {
    expect(sameSong({ title: 'Seville', artist: 'Pinback' }, { title: 'Seville (Live)', artist: 'Pinback' })).toBe(true);
    expect(sameSong({ title: 'Seville', artist: 'Pinback' }, { title: 'Sevilles', artist: 'Pinback' })).toBe(false);
    expect(sameSong({ title: 'Seville', artist: 'Pinback' }, { title: 'Seville', artist: 'Slint' })).toBe(false);
  });
});
