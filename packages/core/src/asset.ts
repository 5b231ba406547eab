import type { Asset, AssetCollection, PlacementRecord, TextureConfig } from "./types.js";
import { NO_AUXILIARY_INDEX } from "./types.js";

export type AssetInit = Partial<Omit<Asset, "id" | "vertexStride">> & {
  id: number;
  vertexStride: number;
};

export function createAsset(init: AssetInit): Asset {
  if (!Number.isInteger(init.id) || init.id < 0) {
    throw new RangeError(`Asset id must be a non-negative integer (got ${init.id}).`);
  }
  if (!Number.isInteger(init.vertexStride) || init.vertexStride < 0) {
    throw new RangeError(`Asset ${init.id} has an invalid vertex stride ${init.vertexStride}.`);
  }
  return {
    id: init.id,
    vertexStride: init.vertexStride,
    vertexCount: init.vertexCount ?? 0,
    faceCount: init.faceCount ?? 0,
    vertexBuffer: init.vertexBuffer ?? new Float32Array(0),
    indexBuffer: init.indexBuffer ?? new Uint16Array(0),
    boneCount: init.boneCount ?? 0,
    lowPolyBoneCount: init.lowPolyBoneCount ?? 0,
    textureConfigs: init.textureConfigs ?? [],
    otherTextureConfigs: init.otherTextureConfigs ?? [],
    animations: init.animations ?? [],
    boneMatrices: init.boneMatrices ?? [],
    boneData: init.boneData ?? [],
    attachments: init.attachments ?? [],
    sounds: init.sounds ?? [],
    indexAttachments: init.indexAttachments ?? new Uint8Array(0),
    otherBuffer: init.otherBuffer ?? new Uint8Array(0),
    otherIndexBuffer: init.otherIndexBuffer ?? new Uint16Array(0),
    weights: init.weights ?? new Uint32Array(0),
    boneIds: init.boneIds ?? new Uint32Array(0),
    headerBlock: init.headerBlock ?? new Uint8Array(0),
    scalars: init.scalars ?? {},
    size: init.size ?? 1,
    skeleton: init.skeleton ?? null,
  };
}

export function createTextureConfig(textureId: number, overrides: Partial<Omit<TextureConfig, "textureId">> = {}): TextureConfig {
  return {
    textureId,
    start: overrides.start ?? 0,
    size: overrides.size ?? 0,
    mode: overrides.mode ?? 0,
    wrapS: overrides.wrapS ?? 0,
    wrapT: overrides.wrapT ?? 0,
  };
}

export function createPlacement(instanceId: number, assetId: number, auxiliary: Uint8Array | null = null): PlacementRecord {
  return {
    instanceId,
    assetId,
    asset: null,
    auxiliaryIndex: NO_AUXILIARY_INDEX,
    auxiliary,
  };
}

export function createAssetCollection(init: Partial<AssetCollection> = {}): AssetCollection {
  const assets = init.assets ?? [];
  return {
    origin: init.origin ?? "unknown",
    assets,
    textures: init.textures ?? [],
    placements: init.placements ?? [],
    assetIds: init.assetIds ?? assets.map((asset) => asset.id),
    auxiliaryTable: init.auxiliaryTable ?? [],
  };
}

export function findAsset(collection: AssetCollection, id: number): Asset | undefined {
  return collection.assets.find((asset) => asset.id === id);
}

/**
 * Rebuild the derived id list and point every placement at its concrete asset.
 * Placements with a negative asset id are left unlinked.
 */
export function refreshCollectionBookkeeping(collection: AssetCollection): { assetIds: number; relinked: number } {
  collection.assetIds = collection.assets.map((asset) => asset.id);
  let relinked = 0;
  for (const placement of collection.placements) {
    if (placement.assetId > -1) {
      placement.asset = findAsset(collection, placement.assetId) ?? null;
      relinked += 1;
    }
  }
  return { assetIds: collection.assetIds.length, relinked };
}
