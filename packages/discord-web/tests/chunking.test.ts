/**
 * Message Chunking Tests
 */

import { describe, it, expect } from 'vitest';
import { splitMessage } from '../src/automation/chunking.js';

const SENTENCE = 'The quick brown fox jumps. ';

describe('splitMessage', () => {
  it('returns content within the limit as a single chunk', () => {
    expect(splitMessage('hello', 2000)).toEqual(['hello']);
    expect(splitMessage('x'.repeat(2000), 2000)).toEqual(['x'.repeat(2000)]);
  });

  it('splits 2500 characters of prose into two chunks at a sentence end', () => {
    const content = SENTENCE.repeat(93).slice(0, 2500);
    const chunks = splitMessage(content, 2000);

    expect(chunks).toHaveLength(2);
    expect(chunks[0]).toHaveLength(1998);
    expect(chunks[0].endsWith('jumps. ')).toBe(true);
    expect(chunks[1]).toHaveLength(502);
    expect(chunks.join('')).toBe(content);
  });

  it('prefers a paragraph break', () => {
    const content = `${'a'.repeat(1200)}\n\n${'b'.repeat(1200)}`;
    expect(splitMessage(content, 2000)).toEqual([`${'a'.repeat(1200)}\n\n`, 'b'.repeat(1200)]);
  });

  it('falls back to a line break when the paragraph break would leave a short chunk', () => {
    const content = `${'x'.repeat(100)}\n\n${'y'.repeat(1500)}\n${'z'.repeat(1000)}`;
    const chunks = splitMessage(content, 2000);

    expect(chunks[0]).toHaveLength(1603);
    expect(chunks[0].endsWith('y\n')).toBe(true);
    expect(chunks[1]).toBe('z'.repeat(1000));
  });

  it('uses the longest boundary found when every boundary is short', () => {
    expect(splitMessage('ab cdefghijklmnop', 10)).toEqual(['ab ', 'cdefghijkl', 'mnop']);
  });

  it('cuts hard when there is no boundary at all', () => {
    const chunks = splitMessage('a'.repeat(4500), 2000);
    expect(chunks.map((chunk) => chunk.length)).toEqual([2000, 2000, 500]);
  });

  it('never cuts between the halves of a surrogate pair', () => {
    expect(splitMessage('abc😀def', 4)).toEqual(['abc', '😀de', 'f']);
  });

  it('keeps every chunk within the limit and loses nothing', () => {
    const words = ['alpha', 'beta.', 'gamma!', 'delta?', '\n', '\n\n', 'epsilon', '😀', 'zeta'];
    let seed = 7;
    const next = (): number => {
      seed = (seed * 48271) % 2147483647;
      return seed;
    };

    for (let round = 0; round < 50; round++) {
      const length = 50 + (next() % 400);
      const parts: string[] = [];
      for (let i = 0; i < length; i++) {
        parts.push(words[next() % words.length]);
      }
      const content = parts.join(next() % 2 === 0 ? ' ' : '');
      const limit = 20 + (next() % 200);
      const chunks = splitMessage(content, limit);

      expect(chunks.join('')).toBe(content);
      for (const chunk of chunks) {
        expect(chunk.length).toBeLessThanOrEqual(limit);
        expect(chunk.length).toBeGreaterThan(0);
      }
    }
  });

  it('rejects limits that cannot hold a surrogate pair', () => {
    expect(() => splitMessage('abc', 1)).toThrow(RangeError);
    expect(() => splitMessage('abc', 2.5)).toThrow(RangeError);
  });
});
