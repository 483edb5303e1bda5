import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { mean, pctChange, round, sampleStd, sum } from './statistics';

describe('statistics', () => {
  it('should sum and average', () => {
    expect(sum([1, 2, 3.5])).toBe(6.5);
    expect(mean([2, 4, 6])).toBe(4);
    expect(mean([])).toBe(0);
  });

  it('should compute the sample standard deviation', () => {
    expect(sampleStd([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(2.13809, 5);
    expect(sampleStd([5])).toBe(0);
  });

  it('should report zero deviation for a constant series', () => {
    expect(sampleStd(new Array<number>(60).fill(-0.02 / 252))).toBe(0);
    expect(sampleStd([0.1 + 0.2, 0.3, 0.1 + 0.2])).toBe(0);
  });

  it('should compute period changes and skip zero bases', () => {
    const changes = pctChange([100, 110, 0, 50, 55]);

    expect(changes).toHaveLength(3);
    expect(changes[0]).toBeCloseTo(0.1, 10);
    expect(changes[1]).toBe(-1);
    expect(changes[2]).toBeCloseTo(0.1, 10);
  });

  it('should round to the given decimals', () => {
    expect(round(1.23456, 2)).toBe(1.23);
    expect(round(2.5, 0)).toBe(3);
  });

  it('should never produce a negative standard deviation', () => {
    fc.assert(
      fc.property(fc.array(fc.double({ min: -1e6, max: 1e6, noNaN: true }), { maxLength: 50 }), values => {
        expect(sampleStd(values)).toBeGreaterThanOrEqual(0);
      }),
      { numRuns: 100 }
    );
  });
});
