import { describe, it, expect } from 'vitest';
import { EndpointPool } from './endpoint-pool.js';

describe('EndpointPool', () => {
  describe('fromConfig', () => {
    it('should use the explicit endpoint list verbatim, duplicates included', () => {
      const pool = EndpointPool.fromConfig({
        url: 'http://legacy:1234/v1/chat/completions',
        endpoints: ['http://a/v1', 'http://b/v1', 'http://a/v1'],
      });
      expect(pool.effectiveEndpoints()).toEqual([
        'http://a/v1',
        'http://b/v1',
        'http://a/v1',
      ]);
    });

    it('should fall back to the single url when the list is empty', () => {
      const pool = EndpointPool.fromConfig({
        url: 'http://legacy:1234/v1/chat/completions',
        endpoints: [],
      });
      expect(pool.effectiveEndpoints()).toEqual([
        'http://legacy:1234/v1/chat/completions',
      ]);
    });

    it('should be empty when neither is configured', () => {
      const pool = EndpointPool.fromConfig({ url: '', endpoints: [] });
      expect(pool.effectiveEndpoints()).toEqual([]);
      expect(pool.size).toBe(0);
    });
  });

  it('should not be affected by later changes to the source array', () => {
    const source = ['http://a/v1', 'http://b/v1'];
    const pool = new EndpointPool(source);
    source.push('http://c/v1');
    expect(pool.size).toBe(2);
  });

  it('should cycle start indices in order', () => {
    const pool = new EndpointPool(['http://a', 'http://b', 'http://c']);
    const indices = Array.from({ length: 7 }, () => pool.nextStartIndex());
    expect(indices).toEqual([0, 1, 2, 0, 1, 2, 0]);
    expect(pool.issued).toBe(7);
  });

  it('should always return 0 for a single endpoint', () => {
    const pool = new EndpointPool(['http://a']);
    expect([pool.nextStartIndex(), pool.nextStartIndex()]).toEqual([0, 0]);
  });

  it('should not lose increments under concurrent callers', async () => {
    const pool = new EndpointPool(['http://a', 'http://b', 'http://c']);
    const indices = await Promise.all(
      Array.from({ length: 100 }, async (_, i) => {
        await new Promise((r) => setTimeout(r, i % 5));
        return pool.nextStartIndex();
      }),
    );
    expect(pool.issued).toBe(100);
    const counts = [0, 0, 0];
    for (const idx of indices) counts[idx]++;
    expect(counts).toEqual([34, 33, 33]);
  });

  it('should throw when asked for a start index with no endpoints', () => {
    const pool = new EndpointPool([]);
    expect(() => pool.nextStartIndex()).toThrow('Endpoint pool is empty');
  });
});
