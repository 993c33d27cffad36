/**
 * Per top-level name file counts produced by a namespace diff.
 */
export interface DiffCounts {
  readonly removed: number;
  readonly added: number;
  readonly changed: number;
}

/** Ordered by the first tree's declaration order, then names only in the second tree. */
export type DiffReport = ReadonlyMap<string, DiffCounts>;
