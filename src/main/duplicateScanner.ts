import type { FileEntry } from '../common/fileTypes';
import type { Classifier } from '../common/classifier';
import { mapWithConcurrency } from '../common/concurrency';
import { PerEntryReadError, describeError } from '../common/errors';
import type { DuplicateGroup } from '../types/organizer';

export const DEFAULT_FINGERPRINT_CONCURRENCY = 4;

export interface DuplicateScanOptions {
  concurrency?: number;
}

export interface DuplicateScanResult {
  groups: DuplicateGroup[];
  failures: Array<{ entry: FileEntry; message: string }>;
  hashedCount: number;
}

const byDiscoveryOrder = (a: FileEntry, b: FileEntry) => a.discoveryIndex - b.discoveryIndex;

const groupBySize = (entries: FileEntry[]) => {
  const sizeGroups = new Map<number, FileEntry[]>();
  for (const entry of entries) {
    const group = sizeGroups.get(entry.size) ?? [];
    group.push(entry);
    sizeGroups.set(entry.size, group);
  }
  return sizeGroups;
};

/**
 * Groups byte-identical files. Sizes are compared first; only entries whose
 * size collides with another entry are fingerprinted. Every fingerprint has
 * settled before this resolves, and members of each group are ordered by
 * discovery index so the survivor is the same whichever hash finished first.
 */
export const findDuplicateGroups = async (
  entries: FileEntry[],
  classifier: Classifier,
  options: DuplicateScanOptions = {},
): Promise<DuplicateScanResult> => {
  const candidates = [...groupBySize(entries).values()]
    .filter((group) => group.length > 1)
    .flat()
    .sort(byDiscoveryOrder);

  const settled = await mapWithConcurrency(
    candidates,
    options.concurrency ?? DEFAULT_FINGERPRINT_CONCURRENCY,
    async (entry) => {
      const classification = await classifier.classify(entry, 'duplicate');
      if (classification.kind !== 'duplicate-candidate') {
        throw new Error(`Unexpected classification ${classification.kind} in duplicate mode`);
      }
      return classification;
    },
  );

  const failures: DuplicateScanResult['failures'] = [];
  const contentGroups = new Map<string, DuplicateGroup>();

  settled.forEach((outcome, index) => {
    const entry = candidates[index];
    if (!outcome.ok) {
      const message =
        outcome.error instanceof PerEntryReadError ? outcome.error.message : describeError(outcome.error);
      failures.push({ entry, message });
      return;
    }
    const { groupKey, fingerprint } = outcome.value;
    const group = contentGroups.get(groupKey) ?? {
      key: groupKey,
      size: entry.size,
      fingerprint,
      members: [],
    };
    group.members.push(entry);
    contentGroups.set(groupKey, group);
  });

  const groups = [...contentGroups.values()]
    .filter((group) => group.members.length > 1)
    .map((group) => ({ ...group, members: [...group.members].sort(byDiscoveryOrder) }))
    .sort((a, b) => byDiscoveryOrder(a.members[0], b.members[0]));

  return {
    groups,
    failures,
    hashedCount: candidates.length,
  };
};
