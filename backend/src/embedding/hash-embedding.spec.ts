import { describe, expect, it } from '@jest/globals';
import { hashEmbedding } from './hash-embedding.js';
import { l2Norm } from './vector-math.js';

describe('hashEmbedding', () => {
  const texts = ['', 'hello world', 'Vector search over content', '向量检索 😀'];

  it.each(texts)('returns a unit vector of the requested dimension for %p', (text) => {
    const vector = hashEmbedding(text, 384);
    expect(vector).toHaveLength(384);
    expect(Math.abs(l2Norm(vector) - 1)).toBeLessThan(1e-6);
  });

  it('is deterministic for identical text', () => {
    expect(hashEmbedding('same text', 64)).toEqual(hashEmbedding('same text', 64));
  });

  it('produces different vectors for different text', () => {
    expect(hashEmbedding('alpha', 64)).not.toEqual(hashEmbedding('beta', 64));
  });

  it('distinguishes texts that differ only in whitespace', () => {
    expect(hashEmbedding('alpha', 16)).not.toEqual(hashEmbedding('alpha ', 16));
  });

  it('supports odd dimensions', () => {
    expect(hashEmbedding('odd', 7)).toHaveLength(7);
  });

  it('yields a signed unit component for dimension 1', () => {
    const [component] = hashEmbedding('single', 1);
    expect(Math.abs(component)).toBeCloseTo(1, 12);
  });

  it('rejects non-positive dimensions', () => {
    expect(() => hashEmbedding('text', 0)).toThrow(RangeError);
  });
});
