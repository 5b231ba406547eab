import {
  createAsset,
  createAssetCollection,
  createPlacement,
  createTextureConfig,
  reconstructSkeleton,
  type Asset,
  type AssetCollection,
  type BoneData,
  type TextureReference,
} from "@assetlift/core";

export function createTexture(width: number, height: number, data: Uint8Array, meta: Record<string, number> = {}): TextureReference {
  return { id: 0, width, height, mipCount: 1, meta, data };
}

export function filledBytes(length: number, seed: number): Uint8Array {
  const out = new Uint8Array(length);
  for (let i = 0; i < length; i += 1) out[i] = (seed + i) % 256;
  return out;
}

/**
 * Asset 42: two configs over distinct 10-byte textures, a 3-frame animation
 * and a root bone with two children.
 */
export function createScenarioAsset(id = 42): Asset {
  const boneMatrices = [filledBytes(64, 1), filledBytes(64, 2), filledBytes(64, 3)];
  const boneData: BoneData[] = [
    { parent: -1, data: filledBytes(16, 10) },
    { parent: 0, data: filledBytes(16, 20) },
    { parent: 0, data: filledBytes(16, 30) },
  ];
  return createAsset({
    id,
    vertexStride: 24,
    vertexCount: 2,
    faceCount: 1,
    vertexBuffer: new Float32Array([0.5, -1, 2, 0, 0, 1, 1.5, 0.25, -2, 0, 1, 0]),
    indexBuffer: new Uint16Array([0, 1, 1]),
    boneCount: 3,
    lowPolyBoneCount: 1,
    textureConfigs: [
      createTextureConfig(0, { start: 0, size: 3, mode: 1 }),
      createTextureConfig(1, { start: 3, size: 3, mode: 2, wrapS: 1 }),
    ],
    otherTextureConfigs: [createTextureConfig(1, { wrapT: 2 })],
    animations: [
      {
        speed: 0.5,
        scalars: { loopStart: 0, loopEnd: 2 },
        frames: [filledBytes(8, 40), filledBytes(8, 50), filledBytes(8, 60)],
        soundIndices: [2, 0],
        trailer: new Uint8Array([0xff]),
      },
    ],
    boneMatrices,
    boneData,
    attachments: [new Uint8Array([9, 9])],
    sounds: [new Uint8Array([7])],
    indexAttachments: new Uint8Array([1, 2]),
    otherBuffer: new Uint8Array([3, 4, 5]),
    otherIndexBuffer: new Uint16Array([2]),
    weights: new Uint32Array([1, 2]),
    boneIds: new Uint32Array([0, 1]),
    headerBlock: filledBytes(8, 0xa0),
    scalars: { radius: 2.5, lod: 3 },
    size: 1.25,
    skeleton: reconstructSkeleton(boneMatrices, boneData, 3).root,
  });
}

export function createScenarioCollection(): AssetCollection {
  const textureA = createTexture(4, 2, filledBytes(10, 1), { vramOffset: 0 });
  const textureB = createTexture(4, 2, filledBytes(10, 11), { vramOffset: 16 });
  return createAssetCollection({
    origin: "level-test",
    textures: [
      { ...textureA, id: 0 },
      { ...textureB, id: 1 },
    ],
    assets: [createScenarioAsset()],
    placements: [createPlacement(1, 42, new Uint8Array([1, 2]))],
  });
}

/** A collection holding one asset whose only config points at a 64x64 texture. */
export function createSingleTextureCollection(assetId: number, texture: TextureReference): AssetCollection {
  return createAssetCollection({
    textures: [texture],
    assets: [createAsset({ id: assetId, vertexStride: 16, textureConfigs: [createTextureConfig(0)] })],
  });
}
