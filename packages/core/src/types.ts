/**
 * In-memory model of a game-asset collection and the model assets it owns.
 * Every numeric reference (texture ids, auxiliary indices, asset ids) is only
 * meaningful inside the collection that holds it.
 */

export interface TextureReference {
  id: number;
  width: number;
  height: number;
  mipCount: number;
  /** Opaque format fields (offsets, VRAM pointer, flags) kept verbatim. */
  meta: Record<string, number>;
  data: Uint8Array;
}

export interface TextureConfig {
  textureId: number;
  start: number;
  size: number;
  mode: number;
  wrapS: number;
  wrapT: number;
}

export interface AnimationRecord {
  speed: number;
  scalars: Record<string, number>;
  /** Per-frame blocks in playback order. */
  frames: Uint8Array[];
  soundIndices: number[];
  trailer: Uint8Array;
}

export interface BoneData {
  parent: number;
  data: Uint8Array;
}

export interface SkeletonNode {
  index: number;
  matrix: Uint8Array;
  children: SkeletonNode[];
}

export interface Asset {
  id: number;
  readonly vertexStride: number;
  vertexCount: number;
  faceCount: number;
  vertexBuffer: Float32Array;
  indexBuffer: Uint16Array;
  boneCount: number;
  lowPolyBoneCount: number;
  textureConfigs: TextureConfig[];
  otherTextureConfigs: TextureConfig[];
  animations: AnimationRecord[];
  boneMatrices: Uint8Array[];
  boneData: BoneData[];
  attachments: Uint8Array[];
  sounds: Uint8Array[];
  indexAttachments: Uint8Array;
  otherBuffer: Uint8Array;
  otherIndexBuffer: Uint16Array;
  weights: Uint32Array;
  boneIds: Uint32Array;
  headerBlock: Uint8Array;
  scalars: Record<string, number>;
  size: number;
  skeleton: SkeletonNode | null;
}

export interface PlacementRecord {
  instanceId: number;
  assetId: number;
  asset: Asset | null;
  /** Index into the collection's auxiliary table, or -1 when the record owns no block. */
  auxiliaryIndex: number;
  auxiliary: Uint8Array | null;
}

export interface AssetCollection {
  origin: string;
  assets: Asset[];
  textures: TextureReference[];
  placements: PlacementRecord[];
  /** Flat asset id list kept in asset order for container bookkeeping. */
  assetIds: number[];
  auxiliaryTable: Uint8Array[];
}

export const NO_AUXILIARY_INDEX = -1;
