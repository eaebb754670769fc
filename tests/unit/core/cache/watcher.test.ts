/**
 * Tests for the change batcher behind watch mode.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const fakeWatcher = vi.hoisted(() => {
  const handlers = new Map<string, (value: string) => void>();
  return {
    handlers,
    instance: {
      on(event: string, handler: (value: string) => void) {
        handlers.set(event, handler);
        return this;
      },
      close: async () => undefined,
    },
  };
});

vi.mock('chokidar', () => ({ default: { watch: () => fakeWatcher.instance } }));

import { ChangeBatcher, watchProject } from '../../../../src/core/cache/watcher.js';
import { CacheStore } from '../../../../src/core/cache/store.js';
import { getDefaultConfig } from '../../../../src/core/config/loader.js';
import { createTempProject } from '../../../helpers/temp-project.js';

describe('ChangeBatcher', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should flush once the debounce window passes without new paths', async () => {
    const flush = vi.fn(async (_paths: string[]) => undefined);
    const batcher = new ChangeBatcher(300, flush, vi.fn());

    batcher.add('src/b.ts');
    batcher.add('src/a.ts');
    await vi.advanceTimersByTimeAsync(299);
    batcher.add('src/c.ts');
    await vi.advanceTimersByTimeAsync(299);
    expect(flush).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(flush).toHaveBeenCalledTimes(1);
    expect(flush).toHaveBeenCalledWith(['src/a.ts', 'src/b.ts', 'src/c.ts']);
    expect(batcher.size).toBe(0);
  });

  it('should collapse repeated paths', async () => {
    const flush = vi.fn(async (_paths: string[]) => undefined);
    const batcher = new ChangeBatcher(100, flush, vi.fn());

    batcher.add('src/a.ts');
    batcher.add('src/a.ts');
    expect(batcher.size).toBe(1);
    await vi.advanceTimersByTimeAsync(100);

    expect(flush).toHaveBeenCalledWith(['src/a.ts']);
  });

  it('should flush immediately on drain', async () => {
    const flush = vi.fn(async (_paths: string[]) => undefined);
    const batcher = new ChangeBatcher(1000, flush, vi.fn());

    batcher.add('src/a.ts');
    await batcher.drain();

    expect(flush).toHaveBeenCalledWith(['src/a.ts']);
    await vi.advanceTimersByTimeAsync(1000);
    expect(flush).toHaveBeenCalledTimes(1);
  });

  it('should drop pending paths on cancel', async () => {
    const flush = vi.fn(async (_paths: string[]) => undefined);
    const batcher = new ChangeBatcher(100, flush, vi.fn());

    batcher.add('src/a.ts');
    batcher.cancel();
    await vi.advanceTimersByTimeAsync(200);

    expect(flush).not.toHaveBeenCalled();
    expect(batcher.size).toBe(0);
  });

  it('should report flush failures to the error handler', async () => {
    const failure = new Error('update failed');
    const onError = vi.fn();
    const batcher = new ChangeBatcher(
      50,
      async () => {
        throw failure;
      },
      onError
    );

    batcher.add('src/a.ts');
    await vi.advanceTimersByTimeAsync(50);

    expect(onError).toHaveBeenCalledWith(failure);
  });
});

describe('watchProject', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    fakeWatcher.handlers.clear();
  });

  it('should log failed updates when no error handler is given', async () => {
    const project = await createTempProject({ 'src/a.ts': 'export const a = 1;\n' });
    const store = new CacheStore(project.root, getDefaultConfig());
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(store, 'update').mockRejectedValue(new Error('disk full'));
    try {
      const watcher = await watchProject(store, { debounceMs: 5 });
      fakeWatcher.handlers.get('change')?.('src/a.ts');

      await vi.waitFor(() => {
        expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('[watch] Update failed: disk full'));
      });
      await watcher.close();
    } finally {
      store.dispose();
      await project.cleanup();
    }
  });
});
