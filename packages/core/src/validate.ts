import { AssetliftError } from "./errors.js";
import type { AssetCollection, PlacementRecord, TextureConfig } from "./types.js";
import { NO_AUXILIARY_INDEX } from "./types.js";

export type IntegrityViolation =
  | {
    kind: "auxiliaryGap";
    missingIndex: number;
    foundIndex: number | null;
    message: string;
  }
  | {
    kind: "duplicateAsset";
    assetId: number;
    count: number;
    message: string;
  }
  | {
    kind: "placementAsset";
    instanceId: number;
    value: number;
    message: string;
  }
  | {
    kind: "placementAuxiliary";
    instanceId: number;
    value: number;
    message: string;
  }
  | {
    kind: "textureConfig";
    assetId: number;
    list: "textureConfigs" | "otherTextureConfigs";
    configIndex: number;
    value: number;
    message: string;
  };

export interface IntegrityReport {
  ok: boolean;
  violations: IntegrityViolation[];
}

/**
 * Distinct non-negative auxiliary indices must form 0..n-1. Several placements
 * may share one index after consolidation; that is not a gap.
 */
export function checkAuxiliaryContiguity(placements: readonly PlacementRecord[]): Extract<IntegrityViolation, { kind: "auxiliaryGap" }> | null {
  const indices = [...new Set(placements.map((placement) => placement.auxiliaryIndex))]
    .filter((index) => index >= 0)
    .sort((a, b) => a - b);
  for (let i = 0; i < indices.length; i += 1) {
    const found = indices[i];
    if (found !== i) {
      return {
        kind: "auxiliaryGap",
        missingIndex: i,
        foundIndex: found ?? null,
        message: `Auxiliary index ${i} is missing (found ${found ?? "nothing"} at position ${i}).`,
      };
    }
  }
  return null;
}

/** Asset ids must be unique; placements link to the first match otherwise. */
export function checkAssetIdentity(collection: AssetCollection): IntegrityViolation[] {
  const counts = new Map<number, number>();
  for (const asset of collection.assets) counts.set(asset.id, (counts.get(asset.id) ?? 0) + 1);
  const violations: IntegrityViolation[] = [];
  for (const [assetId, count] of counts) {
    if (count > 1) {
      violations.push({
        kind: "duplicateAsset",
        assetId,
        count,
        message: `Asset id ${assetId} appears ${count} times in the collection.`,
      });
    }
  }
  return violations;
}

function checkConfigList(
  assetId: number,
  list: "textureConfigs" | "otherTextureConfigs",
  configs: readonly TextureConfig[],
  textureCount: number,
): IntegrityViolation[] {
  const out: IntegrityViolation[] = [];
  configs.forEach((config, configIndex) => {
    if (!Number.isInteger(config.textureId) || config.textureId < 0 || config.textureId >= textureCount) {
      out.push({
        kind: "textureConfig",
        assetId,
        list,
        configIndex,
        value: config.textureId,
        message: `Asset ${assetId} ${list}[${configIndex}] references texture ${config.textureId}, outside [0, ${textureCount}).`,
      });
    }
  });
  return out;
}

export function checkReferenceRanges(collection: AssetCollection): IntegrityViolation[] {
  const violations: IntegrityViolation[] = [];
  const assetIds = new Set(collection.assets.map((asset) => asset.id));
  const auxiliaryCount = collection.auxiliaryTable.length;

  for (const placement of collection.placements) {
    if (!assetIds.has(placement.assetId)) {
      violations.push({
        kind: "placementAsset",
        instanceId: placement.instanceId,
        value: placement.assetId,
        message: `Placement ${placement.instanceId} references asset ${placement.assetId}, which is not in the collection.`,
      });
    }
    const aux = placement.auxiliaryIndex;
    if (aux !== NO_AUXILIARY_INDEX && (aux < 0 || aux >= auxiliaryCount)) {
      violations.push({
        kind: "placementAuxiliary",
        instanceId: placement.instanceId,
        value: aux,
        message: `Placement ${placement.instanceId} has auxiliary index ${aux}, outside [0, ${auxiliaryCount}).`,
      });
    }
  }

  for (const asset of collection.assets) {
    violations.push(...checkConfigList(asset.id, "textureConfigs", asset.textureConfigs, collection.textures.length));
    violations.push(
      ...checkConfigList(asset.id, "otherTextureConfigs", asset.otherTextureConfigs, collection.textures.length),
    );
  }

  return violations;
}

export function validateCollection(collection: AssetCollection): IntegrityReport {
  const violations: IntegrityViolation[] = [];
  const gap = checkAuxiliaryContiguity(collection.placements);
  if (gap) violations.push(gap);
  violations.push(...checkAssetIdentity(collection));
  violations.push(...checkReferenceRanges(collection));
  return { ok: violations.length === 0, violations };
}

export function assertContiguousAuxiliary(placements: readonly PlacementRecord[]): void {
  const gap = checkAuxiliaryContiguity(placements);
  if (gap) {
    throw new AssetliftError("AL_ERR_INTEGRITY_VIOLATION", gap.message);
  }
}
