export interface OrderedRevision {
  revision: number; // timestamp
  path: string;
}

/**
 * Total order used to serialize revisions of many files into one linear
 * history: timestamp, then path, then revision id.
 */
export function compareRevisions(a: OrderedRevision, b: OrderedRevision): number {
  if (a.revision !== b.revision) return a.revision - b.revision;
  if (a.path !== b.path) return a.path < b.path ? -1 : 1;
  return 0;
}

export function sortRevisions<T extends OrderedRevision>(revisions: readonly T[]): T[] {
  return [...revisions].sort(compareRevisions);
}
