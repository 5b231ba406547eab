import { AssetliftError } from "./errors.js";

export type ReferenceNamespace = "texture" | "auxiliary" | "asset";

export interface ReferenceRemapper {
  record(namespace: ReferenceNamespace, sourceIndex: number, destinationIndex: number): void;
  /** Throws AL_ERR_NOT_FOUND when nothing was recorded for the source index. */
  resolve(namespace: ReferenceNamespace, sourceIndex: number): number;
  has(namespace: ReferenceNamespace, sourceIndex: number): boolean;
  entries(namespace: ReferenceNamespace): Array<[number, number]>;
}

export function createReferenceRemapper(): ReferenceRemapper {
  const tables = new Map<ReferenceNamespace, Map<number, number>>();

  const tableFor = (namespace: ReferenceNamespace): Map<number, number> => {
    let table = tables.get(namespace);
    if (!table) {
      table = new Map<number, number>();
      tables.set(namespace, table);
    }
    return table;
  };

  return {
    record(namespace, sourceIndex, destinationIndex) {
      tableFor(namespace).set(sourceIndex, destinationIndex);
    },
    resolve(namespace, sourceIndex) {
      const mapped = tables.get(namespace)?.get(sourceIndex);
      if (mapped === undefined) {
        throw new AssetliftError(
          "AL_ERR_NOT_FOUND",
          `No ${namespace} mapping recorded for source index ${sourceIndex}.`,
        );
      }
      return mapped;
    },
    has(namespace, sourceIndex) {
      return tables.get(namespace)?.has(sourceIndex) ?? false;
    },
    entries(namespace) {
      return [...(tables.get(namespace)?.entries() ?? [])];
    },
  };
}
