import { describe, it, expect, vi } from 'vitest';
import { BoundedMap } from '../../../src/utils/bounded-map.js';

describe('BoundedMap', () => {
  describe('constructor', () => {
    it('rejects a capacity below one', () => {
      expect(() => new BoundedMap(0)).toThrow('BoundedMap maxSize must be a positive integer, got 0');
    });

    it('rejects a fractional capacity', () => {
      expect(() => new BoundedMap(2.5)).toThrow(RangeError);
    });

    it('starts empty', () => {
      const m = new BoundedMap<string, number>(10);
      expect(m.size).toBe(0);
      expect(m.capacity).toBe(10);
    });
  });

  describe('get/set', () => {
    it('stores and retrieves values', () => {
      const m = new BoundedMap<string, number>(10);
      m.set('a', 1).set('b', 2);
      expect(m.get('a')).toBe(1);
      expect(m.get('b')).toBe(2);
      expect(m.get('missing')).toBeUndefined();
    });

    it('overwrites existing keys without growing', () => {
      const m = new BoundedMap<string, number>(10);
      m.set('a', 1);
      m.set('a', 99);
      expect(m.get('a')).toBe(99);
      expect(m.size).toBe(1);
    });

    it('keeps falsy values distinct from missing keys', () => {
      const m = new BoundedMap<string, number>(2);
      m.set('zero', 0);
      expect(m.get('zero')).toBe(0);
      expect(m.has('zero')).toBe(true);
    });
  });

  describe('eviction', () => {
    it('evicts the least recently used entry at capacity', () => {
      const m = new BoundedMap<string, number>(2);
      m.set('a', 1);
      m.set('b', 2);
      m.set('c', 3);
      expect(m.has('a')).toBe(false);
      expect([...m.entries()]).toEqual([['b', 2], ['c', 3]]);
    });

    it('treats a read as a use', () => {
      const m = new BoundedMap<string, number>(2);
      m.set('a', 1);
      m.set('b', 2);
      m.get('a');
      m.set('c', 3);
      expect(m.has('a')).toBe(true);
      expect(m.has('b')).toBe(false);
    });

    it('does not treat peek as a use', () => {
      const m = new BoundedMap<string, number>(2);
      m.set('a', 1);
      m.set('b', 2);
      expect(m.peek('a')).toBe(1);
      m.set('c', 3);
      expect(m.has('a')).toBe(false);
    });

    it('reports evictions to the handler', () => {
      const onEvict = vi.fn();
      const m = new BoundedMap<string, number>(1, onEvict);
      m.set('a', 1);
      m.set('a', 2);
      expect(onEvict).not.toHaveBeenCalled();
      m.set('b', 3);
      expect(onEvict).toHaveBeenCalledWith('a', 2);
    });
  });

  describe('delete/clear', () => {
    it('deletes single keys and clears everything', () => {
      const m = new BoundedMap<string, number>(3);
      m.set('a', 1).set('b', 2);
      expect(m.delete('a')).toBe(true);
      expect(m.delete('a')).toBe(false);
      m.clear();
      expect(m.size).toBe(0);
      expect([...m]).toEqual([]);
    });
  });
});
