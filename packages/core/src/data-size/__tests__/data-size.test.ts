/**
 * Data Size Tests
 */

import { describe, it, expect } from 'vitest';
import {
  binarySize,
  compareDataSize,
  distinctSizes,
  formatDataSize,
  sizeComponents,
  sizeSetsEqual,
  unarySize,
} from '../data-size.js';

describe('compareDataSize', () => {
  it('should order unary sizes numerically', () => {
    expect(compareDataSize(unarySize(5), unarySize(10))).toBeLessThan(0);
    expect(compareDataSize(unarySize(10), unarySize(5))).toBeGreaterThan(0);
    expect(compareDataSize(unarySize(7), unarySize(7))).toBe(0);
  });

  it('should order binary sizes component by component', () => {
    expect(compareDataSize(binarySize(5, 9), binarySize(6, 1))).toBeLessThan(0);
    expect(compareDataSize(binarySize(5, 4), binarySize(5, 9))).toBeLessThan(0);
  });

  it('should put unary sizes before binary sizes', () => {
    expect(compareDataSize(unarySize(100), binarySize(1, 1))).toBeLessThan(0);
    expect(compareDataSize(binarySize(1, 1), unarySize(100))).toBeGreaterThan(0);
  });
});

describe('distinctSizes', () => {
  it('should sort and drop duplicates', () => {
    const sizes = distinctSizes([unarySize(10), unarySize(5), unarySize(10), unarySize(1)]);

    expect(sizes.map(formatDataSize)).toEqual(['1', '5', '10']);
  });

  it('should keep pairs that differ in either component', () => {
    const sizes = distinctSizes([binarySize(5, 9), binarySize(5, 4), binarySize(5, 4)]);

    expect(sizes.map(formatDataSize)).toEqual(['(5, 4)', '(5, 9)']);
  });
});

describe('sizeSetsEqual', () => {
  it('should ignore order and repetition', () => {
    expect(sizeSetsEqual([unarySize(5), unarySize(10)], [unarySize(10), unarySize(5), unarySize(5)])).toBe(true);
  });

  it('should notice a missing size', () => {
    expect(sizeSetsEqual([unarySize(5), unarySize(10)], [unarySize(5), unarySize(15)])).toBe(false);
  });
});

describe('sizeComponents', () => {
  it('should list the integers of a size', () => {
    expect(sizeComponents(unarySize(3))).toEqual([3]);
    expect(sizeComponents(binarySize(3, 4))).toEqual([3, 4]);
  });
});
