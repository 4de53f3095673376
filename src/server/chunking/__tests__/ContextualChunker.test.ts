import { describe, it, expect } from 'vitest';
import { chunkByCharacters } from '../ContextualChunker.js';

describe('chunkByCharacters', () => {
  it('returns nothing for empty text', () => {
    expect(chunkByCharacters('')).toEqual([]);
  });

  it('returns text of exactly chunkSize characters as one chunk', () => {
    const text = 'a'.repeat(800);
    expect(chunkByCharacters(text, { chunkSize: 800, chunkOverlap: 100 })).toEqual([text]);
  });

  it('cuts after the last sentence end in the search window', () => {
    const text = `${'a'.repeat(30)}. ${'b'.repeat(30)}`;

    expect(chunkByCharacters(text, { chunkSize: 40, chunkOverlap: 0 })).toEqual([
      `${'a'.repeat(30)}.`,
      'b'.repeat(30),
    ]);
  });

  it('starts the next chunk chunkOverlap characters before the cut', () => {
    const text = `${'a'.repeat(30)}. ${'b'.repeat(30)}`;

    expect(chunkByCharacters(text, { chunkSize: 40, chunkOverlap: 5 })).toEqual([
      `${'a'.repeat(30)}.`,
      `aaa. ${'b'.repeat(30)}`,
    ]);
  });

  it('falls back to hard cuts without sentence ends', () => {
    const chunks = chunkByCharacters('x'.repeat(100), { chunkSize: 40, chunkOverlap: 10 });

    expect(chunks).toEqual(['x'.repeat(40), 'x'.repeat(40), 'x'.repeat(40)]);
  });

  it('does not cut a surrogate pair apart on a hard cut', () => {
    const chunks = chunkByCharacters('abcd\u{1F600}efgh', { chunkSize: 5, chunkOverlap: 0, boundarySearchWindow: 0 });

    expect(chunks).toEqual(['abcd', '\u{1F600}efg', 'h']);
  });

  it('does not start an overlapping chunk inside a surrogate pair', () => {
    const chunks = chunkByCharacters('abc\u{1F600}defgh', { chunkSize: 5, chunkOverlap: 1, boundarySearchWindow: 0 });

    expect(chunks).toEqual(['abc\u{1F600}', 'defgh']);
  });

  it('terminates when the overlap is not smaller than the chunk size', () => {
    const chunks = chunkByCharacters('y'.repeat(25), { chunkSize: 10, chunkOverlap: 50 });

    expect(chunks).toHaveLength(16);
    expect(chunks.every((chunk) => chunk.length === 10)).toBe(true);
  });

  it('keeps every chunk within chunkSize characters', () => {
    const text = Array.from({ length: 120 }, (_, i) => `Sentence number ${i} talks about districts.`).join(' ');
    const chunks = chunkByCharacters(text, { chunkSize: 800, chunkOverlap: 100 });

    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.every((chunk) => chunk.length <= 800)).toBe(true);
  });
});
