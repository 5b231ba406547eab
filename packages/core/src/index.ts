export type {
  Asset,
  AssetCollection,
  AnimationRecord,
  BoneData,
  PlacementRecord,
  SkeletonNode,
  TextureConfig,
  TextureReference,
} from "./types.js";
export { NO_AUXILIARY_INDEX } from "./types.js";
export {
  createAsset,
  createAssetCollection,
  createPlacement,
  createTextureConfig,
  findAsset,
  refreshCollectionBookkeeping,
} from "./asset.js";
export type { AssetInit } from "./asset.js";
export { AssetliftError, asAssetliftError, isAssetliftError, toErrorPayload } from "./errors.js";
export type { AssetliftErrorCode, ErrorPayload } from "./errors.js";
export {
  TEXTURE_CONFIG_BYTES,
  base64ToBytes,
  bytesEqual,
  bytesToBase64,
  bytesToFloat32,
  bytesToUint16,
  bytesToUint32,
  float32ToBytes,
  packTextureConfig,
  uint16ToBytes,
  uint32ToBytes,
  unpackTextureConfig,
} from "./bytes.js";
export { sha256HexFromBytes, stableJsonStringify } from "./hash.js";
export { DEFAULT_DIGEST_THRESHOLD, createContentDeduplicator } from "./deduplicator.js";
export type { ContentDeduplicator, ContentDeduplicatorOptions } from "./deduplicator.js";
export { createReferenceRemapper } from "./remapper.js";
export type { ReferenceNamespace, ReferenceRemapper } from "./remapper.js";
export { consolidateAuxiliaryBlocks, consolidateBlocks } from "./consolidate.js";
export type { ConsolidationAccessors, ConsolidationResult } from "./consolidate.js";
export { flattenSkeleton, insertBone, reconstructSkeleton } from "./skeleton.js";
export type { SkeletonReconstruction } from "./skeleton.js";
export {
  assertContiguousAuxiliary,
  checkAssetIdentity,
  checkAuxiliaryContiguity,
  checkReferenceRanges,
  validateCollection,
} from "./validate.js";
export type { IntegrityReport, IntegrityViolation } from "./validate.js";
