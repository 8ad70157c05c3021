import { describe, it, expect } from 'vitest';
import { CycleError, topologicalSort } from '../src/engine/text/tsort';
import { randomInt, seededRandom } from './helpers/random';

describe('topologicalSort', () => {
  it('should order a chain', () => {
    expect(topologicalSort(['a b', 'b c'])).toEqual(['a', 'b', 'c']);
  });

  it('should read pairs across line boundaries', () => {
    expect(topologicalSort(['shirt tie tie', 'jacket'])).toEqual(['shirt', 'tie', 'jacket']);
  });

  it('should be deterministic for independent nodes', () => {
    expect(topologicalSort(['x x', 'y y', 'z z'])).toEqual(['x', 'y', 'z']);
  });

  it('should put every predecessor first', () => {
    const order = topologicalSort(['socks shoes', 'pants shoes', 'pants belt', 'shirt belt']);
    expect(order).toEqual(['shirt', 'pants', 'belt', 'socks', 'shoes']);
  });

  it('should reject an odd number of tokens', () => {
    expect(() => topologicalSort(['a b c'])).toThrow('input contains an odd number of tokens');
  });

  it('should name the loop', () => {
    expect(() => topologicalSort(['a b', 'b c', 'c a'])).toThrow(CycleError);
    expect(() => topologicalSort(['a b', 'b c', 'c a'])).toThrow('input contains a loop: a -> b -> c -> a');
  });

  it('should order a long chain without exhausting the stack', () => {
    const pairs = Array.from({ length: 20000 }, (_, i) => `n${i} n${i + 1}`);
    const order = topologicalSort(pairs);
    expect(order).toHaveLength(20001);
    expect(order[0]).toBe('n0');
    expect(order[20000]).toBe('n20000');
  });

  it('should report a loop at the end of a long chain', () => {
    const pairs = Array.from({ length: 20000 }, (_, i) => `n${i} n${i + 1}`);
    expect(() => topologicalSort([...pairs, 'n20000 n19999'])).toThrow(
      'input contains a loop: n19999 -> n20000 -> n19999'
    );
  });

  it('should put u before v for every edge of generated graphs', () => {
    const random = seededRandom(7);
    for (let round = 0; round < 50; round++) {
      const size = 2 + randomInt(random, 30);
      const pairs: string[] = [];
      for (let k = 0; k < size * 2; k++) {
        // Edges only go from a lower to a higher index, so there is no loop
        const u = randomInt(random, size - 1);
        const v = u + 1 + randomInt(random, size - u - 1);
        pairs.push(`v${u} v${v}`);
      }
      const order = topologicalSort(pairs);
      const position = new Map(order.map((node, index) => [node, index]));
      expect(new Set(order).size).toBe(order.length);
      for (const pair of pairs) {
        const [u, v] = pair.split(' ');
        expect(position.get(u)).toBeLessThan(position.get(v) ?? -1);
      }
    }
  });
});
