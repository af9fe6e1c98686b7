import type { BackendType, SourceDescriptor } from '../types/source.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('partition');

export interface BackendPartition {
  backendType: BackendType;
  sources: SourceDescriptor[];
}

/**
 * Group sources by backend type.
 *
 * Algorithm:
 * - Skip disabled sources
 * - Walk sources in input order, appending each to its type's group
 * - Groups come out in order of first appearance, and sources keep their
 *   input order inside a group
 *
 * @param sources - Sources to distribute
 * @returns One partition per backend type that has at least one enabled source
 */
export function partitionByBackend(sources: readonly SourceDescriptor[]): BackendPartition[] {
  const groups = new Map<BackendType, SourceDescriptor[]>();

  for (const source of sources) {
    if (!source.enabled) {
      continue;
    }
    const group = groups.get(source.backendType);
    if (group) {
      group.push(source);
    } else {
      groups.set(source.backendType, [source]);
    }
  }

  const partitions = [...groups].map(([backendType, grouped]) => ({ backendType, sources: grouped }));
  log.debug(`Split ${sources.length} sources into ${partitions.length} partitions`);
  return partitions;
}
