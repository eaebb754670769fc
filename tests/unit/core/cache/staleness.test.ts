/**
 * Tests for staleness detection.
 */
import { describe, it, expect } from 'vitest';
import { checkStaleness, type FileProbe } from '../../../../src/core/cache/staleness.js';
import { defaultConcurrency } from '../../../../src/core/indexer/pool.js';
import type { CacheRoot } from '../../../../src/core/cache/types.js';
import { probeOf, rootFromSources } from '../../../helpers/index-sources.js';

const A = 'export function a() {}\n';
const B = 'export function b() {}\n';

describe('checkStaleness', () => {
  const root = rootFromSources({ 'src/a.ts': A, 'src/b.ts': B });

  it('should report a fresh cache', async () => {
    expect(await checkStaleness(root, probeOf({ 'src/a.ts': A, 'src/b.ts': B }))).toEqual({
      stale: false,
      staleFiles: [],
    });
  });

  it('should report changed and deleted files, sorted', async () => {
    const report = await checkStaleness(root, probeOf({ 'src/a.ts': A.replace('a()', 'a2()') }));

    expect(report).toEqual({ stale: true, staleFiles: ['src/a.ts', 'src/b.ts'] });
  });

  it('should ignore files the cache never recorded', async () => {
    const report = await checkStaleness(root, probeOf({ 'src/a.ts': A, 'src/b.ts': B, 'src/new.ts': 'x' }));

    expect(report.stale).toBe(false);
  });

  describe('read concurrency', () => {
    const many: CacheRoot = {
      ...root,
      contentHashes: Object.fromEntries(Array.from({ length: 500 }, (_, i) => [`src/f${i}.ts`, `hash-${i}`])),
    };

    function countingProbe(): { probe: FileProbe; peak(): number } {
      let inFlight = 0;
      let peak = 0;
      return {
        probe: {
          async hashOf(path) {
            inFlight++;
            peak = Math.max(peak, inFlight);
            await new Promise((resolve) => setTimeout(resolve, 1));
            inFlight--;
            return `hash-${path.slice('src/f'.length, -'.ts'.length)}`;
          },
        },
        peak: () => peak,
      };
    }

    it('should read at most the given number of files at once', async () => {
      const counter = countingProbe();

      const report = await checkStaleness(many, counter.probe, 4);

      expect(report.stale).toBe(false);
      expect(counter.peak()).toBe(4);
    });

    it('should bound reads by the default concurrency', async () => {
      const counter = countingProbe();

      await checkStaleness(many, counter.probe);

      expect(counter.peak()).toBeLessThanOrEqual(Math.min(500, defaultConcurrency()));
    });
  });
});
