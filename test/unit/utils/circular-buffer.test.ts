import { describe, it, expect } from 'vitest';
import { CircularBuffer } from '../../../src/utils/circular-buffer.js';

describe('CircularBuffer', () => {
  it('throws if capacity < 1', () => {
    expect(() => new CircularBuffer(0)).toThrow('capacity must be >= 1');
  });

  describe('push', () => {
    it('returns undefined while there is room', () => {
      const buf = new CircularBuffer<number>(3);
      expect(buf.push(1)).toBeUndefined();
      expect(buf.push(2)).toBeUndefined();
      expect(buf.length).toBe(2);
      expect(buf.isFull).toBe(false);
    });

    it('overwrites and returns the oldest when full', () => {
      const buf = new CircularBuffer<number>(3);
      buf.push(1);
      buf.push(2);
      buf.push(3);
      expect(buf.push(4)).toBe(1);
      expect(buf.push(5)).toBe(2);
      expect(buf.toArray()).toEqual([3, 4, 5]);
    });
  });

  describe('shift', () => {
    it('returns undefined when empty', () => {
      expect(new CircularBuffer<number>(2).shift()).toBeUndefined();
    });

    it('removes items oldest first', () => {
      const buf = new CircularBuffer<string>(4);
      buf.push('a');
      buf.push('b');
      buf.push('c');
      expect(buf.shift()).toBe('a');
      expect(buf.shift()).toBe('b');
      expect(buf.length).toBe(1);
      expect(buf.toArray()).toEqual(['c']);
    });

    it('keeps order when pushes and shifts interleave across the wrap', () => {
      const buf = new CircularBuffer<number>(3);
      buf.push(1);
      buf.push(2);
      buf.shift();
      buf.push(3);
      buf.push(4);
      expect(buf.isFull).toBe(true);
      expect(buf.toArray()).toEqual([2, 3, 4]);
      expect(buf.push(5)).toBe(2);
      expect(buf.shift()).toBe(3);
      expect(buf.toArray()).toEqual([4, 5]);
    });
  });

  it('clear resets the buffer for reuse', () => {
    const buf = new CircularBuffer<number>(3);
    buf.push(1);
    buf.push(2);
    buf.clear();
    expect(buf.length).toBe(0);
    buf.push(10);
    expect(buf.toArray()).toEqual([10]);
  });

  it('capacity of 1 keeps only the latest', () => {
    const buf = new CircularBuffer<string>(1);
    buf.push('a');
    expect(buf.push('b')).toBe('a');
    expect(buf.toArray()).toEqual(['b']);
  });
});
