/**
 * Staleness: recorded content hashes against the files on disk.
 */
import type { CacheRoot } from './types.js';
import { computeChecksum } from '../../utils/checksum.js';
import { fromProjectPath, readFileIfExists } from '../../utils/file-system.js';
import { compareStrings } from '../../utils/collections.js';
import { defaultConcurrency, processInBatches } from '../indexer/pool.js';

/**
 * Source of current file hashes; null for a missing file.
 */
export interface FileProbe {
  hashOf(projectPath: string): Promise<string | null>;
}

export function createDiskProbe(projectRoot: string): FileProbe {
  return {
    async hashOf(projectPath: string): Promise<string | null> {
      const content = await readFileIfExists(fromProjectPath(projectRoot, projectPath));
      return content === null ? null : computeChecksum(content);
    },
  };
}

export interface StalenessReport {
  stale: boolean;
  /** Recorded files that changed or disappeared, sorted */
  staleFiles: string[];
}

/**
 * Compare every recorded hash with the probe, reading at most
 * `concurrency` files at a time.
 */
export async function checkStaleness(
  root: CacheRoot,
  probe: FileProbe,
  concurrency: number = defaultConcurrency()
): Promise<StalenessReport> {
  const results = await processInBatches(
    Object.entries(root.contentHashes),
    concurrency,
    async ([path, recorded]) => ((await probe.hashOf(path)) === recorded ? null : path)
  );
  const staleFiles = results.filter((path): path is string => path !== null).sort(compareStrings);
  return { stale: staleFiles.length > 0, staleFiles };
}
