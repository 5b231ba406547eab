import { createContentDeduplicator, type ContentDeduplicatorOptions } from "./deduplicator.js";
import type { AssetCollection } from "./types.js";
import { NO_AUXILIARY_INDEX } from "./types.js";

export interface ConsolidationAccessors<T> {
  getBlock(record: T): Uint8Array | null;
  setIndex(record: T, index: number): void;
}

export interface ConsolidationResult {
  table: Uint8Array[];
  /** Assigned index per input record, in input order. */
  assigned: number[];
  emptyRecords: number;
}

/**
 * Content-address a block per record against a pool scoped to this call.
 * Empty (or missing) blocks get the -1 sentinel and stay out of the pool, so
 * the resulting table indices run 0..n-1 in first-occurrence order.
 */
export function consolidateBlocks<T>(
  records: readonly T[],
  accessors: ConsolidationAccessors<T>,
  options: ContentDeduplicatorOptions = {},
): ConsolidationResult {
  const pool = createContentDeduplicator(options);
  const assigned: number[] = [];
  let emptyRecords = 0;

  for (const record of records) {
    const block = accessors.getBlock(record);
    if (!block || block.byteLength === 0) {
      accessors.setIndex(record, NO_AUXILIARY_INDEX);
      assigned.push(NO_AUXILIARY_INDEX);
      emptyRecords += 1;
      continue;
    }
    const index = pool.intern(block);
    accessors.setIndex(record, index);
    assigned.push(index);
  }

  return { table: pool.entries(), assigned, emptyRecords };
}

export function consolidateAuxiliaryBlocks(
  collection: AssetCollection,
  options: ContentDeduplicatorOptions = {},
): ConsolidationResult {
  const result = consolidateBlocks(
    collection.placements,
    {
      getBlock: (placement) => placement.auxiliary,
      setIndex: (placement, index) => {
        placement.auxiliaryIndex = index;
        if (index === NO_AUXILIARY_INDEX) placement.auxiliary = null;
      },
    },
    options,
  );
  collection.auxiliaryTable = result.table;
  return result;
}
