import { describe, it, expect } from 'vitest';
import {
  findMatchingEntry,
  normalizeFileName,
  toFileStem,
} from '../../../resolution/file-names.js';

describe('normalizeFileName', () => {
  it('should lower-case and append the extension', () => {
    expect(normalizeFileName('H171')).toBe('h171.ssp');
  });

  it('should not append the extension twice', () => {
    expect(normalizeFileName('h171.SSP')).toBe('h171.ssp');
    expect(normalizeFileName('h171.ssp')).toBe('h171.ssp');
  });
});

describe('toFileStem', () => {
  it('should strip the extension', () => {
    expect(toFileStem('H168IF1.ssp')).toBe('h168if1');
    expect(toFileStem('h171')).toBe('h171');
  });
});

describe('findMatchingEntry', () => {
  it('should match case-insensitively and return the on-disk name', () => {
    expect(findMatchingEntry('h171', ['README.txt', 'H171.SSP'])).toBe('H171.SSP');
  });

  it('should match entries stored without the extension', () => {
    expect(findMatchingEntry('h171.ssp', ['h171'])).toBe('h171');
  });

  it('should pick the first entry in name order when several match', () => {
    expect(findMatchingEntry('h171', ['h171.ssp', 'H171.ssp'])).toBe('H171.ssp');
  });

  it('should return null when nothing matches', () => {
    expect(findMatchingEntry('h171', ['h170.ssp', 'h1711.ssp', 'h171.ssp.zip'])).toBeNull();
    expect(findMatchingEntry('h171', [])).toBeNull();
  });
});
