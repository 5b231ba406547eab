import {
  base64ToBytes,
  bytesToBase64,
  bytesToFloat32,
  bytesToUint16,
  bytesToUint32,
  createAsset,
  float32ToBytes,
  packTextureConfig,
  reconstructSkeleton,
  uint16ToBytes,
  uint32ToBytes,
  unpackTextureConfig,
  type AnimationRecord,
  type Asset,
  type TextureConfig,
  type TextureReference,
} from "@assetlift/core";
import type { AssetBody, TextureConfigRecord, TextureRecord, WireFloat } from "./schema.js";

export function encodeFloat(value: number): WireFloat {
  if (Number.isNaN(value)) return "NaN";
  if (value === Infinity) return "Infinity";
  if (value === -Infinity) return "-Infinity";
  if (Object.is(value, -0)) return "-0";
  return value;
}

export function decodeFloat(value: WireFloat): number {
  return typeof value === "number" ? value : Number(value);
}

function encodeFloatMap(values: Readonly<Record<string, number>>): Record<string, WireFloat> {
  const out: Record<string, WireFloat> = {};
  for (const [key, value] of Object.entries(values)) out[key] = encodeFloat(value);
  return out;
}

function decodeFloatMap(values: Readonly<Record<string, WireFloat>>): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [key, value] of Object.entries(values)) out[key] = decodeFloat(value);
  return out;
}

/** Texture equality covers dimensions and mip count as well as texel bytes. */
export function textureContentTag(texture: { width: number; height: number; mipCount: number }): string {
  return `${texture.width}x${texture.height}:${texture.mipCount}`;
}

export function encodeTextureRecord(texture: TextureReference, id: number): TextureRecord {
  return {
    id,
    width: texture.width,
    height: texture.height,
    mipCount: texture.mipCount,
    meta: encodeFloatMap(texture.meta),
    data: bytesToBase64(texture.data),
  };
}

export function decodeTextureRecord(record: TextureRecord, id: number = record.id): TextureReference {
  return {
    id,
    width: record.width,
    height: record.height,
    mipCount: record.mipCount,
    meta: decodeFloatMap(record.meta),
    data: base64ToBytes(record.data),
  };
}

function encodeConfigs(configs: readonly TextureConfig[]): TextureConfigRecord[] {
  return configs.map((config) => ({
    id: config.textureId,
    config: bytesToBase64(packTextureConfig(config)),
  }));
}

function encodeAnimation(animation: AnimationRecord) {
  return {
    speed: encodeFloat(animation.speed),
    scalars: encodeFloatMap(animation.scalars),
    frames: animation.frames.map((frame) => bytesToBase64(frame)),
    sounds: [...animation.soundIndices],
    trailer: bytesToBase64(animation.trailer),
  };
}

export function encodeAssetBody(asset: Asset): AssetBody {
  return {
    assetId: asset.id,
    vertexStride: asset.vertexStride,
    vertexCount: asset.vertexCount,
    faceCount: asset.faceCount,
    vertexBuffer: bytesToBase64(float32ToBytes(asset.vertexBuffer)),
    indexBuffer: bytesToBase64(uint16ToBytes(asset.indexBuffer)),
    boneCount: asset.boneCount,
    lowPolyBoneCount: asset.lowPolyBoneCount,
    textureConfigs: encodeConfigs(asset.textureConfigs),
    otherTextureConfigs: encodeConfigs(asset.otherTextureConfigs),
    animations: asset.animations.map(encodeAnimation),
    boneMatrices: asset.boneMatrices.map((matrix) => bytesToBase64(matrix)),
    boneData: asset.boneData.map((bone) => ({ parent: bone.parent, data: bytesToBase64(bone.data) })),
    attachments: asset.attachments.map((attachment) => bytesToBase64(attachment)),
    sounds: asset.sounds.map((sound) => bytesToBase64(sound)),
    indexAttachments: bytesToBase64(asset.indexAttachments),
    otherBuffer: bytesToBase64(asset.otherBuffer),
    otherIndexBuffer: bytesToBase64(uint16ToBytes(asset.otherIndexBuffer)),
    weights: bytesToBase64(uint32ToBytes(asset.weights)),
    boneIds: bytesToBase64(uint32ToBytes(asset.boneIds)),
    headerBlock: bytesToBase64(asset.headerBlock),
    scalars: encodeFloatMap(asset.scalars),
    size: encodeFloat(asset.size),
  };
}

export type TextureIdResolver = (sourceId: number, location: string) => number;

export interface DecodedAssetBody {
  asset: Asset;
  bonesAttached: number;
  warnings: string[];
}

function decodeConfigs(
  records: readonly TextureConfigRecord[],
  list: "textureConfigs" | "otherTextureConfigs",
  resolveTextureId: TextureIdResolver,
): TextureConfig[] {
  return records.map((record, index) => {
    const config = unpackTextureConfig(base64ToBytes(record.config));
    return { ...config, textureId: resolveTextureId(record.id, `${list}[${index}]`) };
  });
}

/**
 * Rebuild an asset from its wire body. Texture ids go through the resolver so
 * the caller decides how source ids map into the destination pool.
 */
export function decodeAssetBody(body: AssetBody, resolveTextureId: TextureIdResolver): DecodedAssetBody {
  const label = `Asset ${body.assetId}`;
  const boneMatrices = body.boneMatrices.map((matrix) => base64ToBytes(matrix));
  const boneData = body.boneData.map((bone) => ({ parent: bone.parent, data: base64ToBytes(bone.data) }));
  const skeleton = reconstructSkeleton(boneMatrices, boneData, body.boneCount);

  const asset = createAsset({
    id: body.assetId,
    vertexStride: body.vertexStride,
    vertexCount: body.vertexCount,
    faceCount: body.faceCount,
    vertexBuffer: bytesToFloat32(base64ToBytes(body.vertexBuffer), `${label} vertex buffer`),
    indexBuffer: bytesToUint16(base64ToBytes(body.indexBuffer), `${label} index buffer`),
    boneCount: body.boneCount,
    lowPolyBoneCount: body.lowPolyBoneCount,
    textureConfigs: decodeConfigs(body.textureConfigs, "textureConfigs", resolveTextureId),
    otherTextureConfigs: decodeConfigs(body.otherTextureConfigs, "otherTextureConfigs", resolveTextureId),
    animations: body.animations.map((animation) => ({
      speed: decodeFloat(animation.speed),
      scalars: decodeFloatMap(animation.scalars),
      frames: animation.frames.map((frame) => base64ToBytes(frame)),
      soundIndices: [...animation.sounds],
      trailer: base64ToBytes(animation.trailer),
    })),
    boneMatrices,
    boneData,
    attachments: body.attachments.map((attachment) => base64ToBytes(attachment)),
    sounds: body.sounds.map((sound) => base64ToBytes(sound)),
    indexAttachments: base64ToBytes(body.indexAttachments),
    otherBuffer: base64ToBytes(body.otherBuffer),
    otherIndexBuffer: bytesToUint16(base64ToBytes(body.otherIndexBuffer), `${label} other index buffer`),
    weights: bytesToUint32(base64ToBytes(body.weights), `${label} weights`),
    boneIds: bytesToUint32(base64ToBytes(body.boneIds), `${label} bone ids`),
    headerBlock: base64ToBytes(body.headerBlock),
    scalars: decodeFloatMap(body.scalars),
    size: decodeFloat(body.size),
    skeleton: skeleton.root,
  });

  return {
    asset,
    bonesAttached: skeleton.bonesAttached,
    warnings: skeleton.warnings.map((warning) => `${label}: ${warning}`),
  };
}
