import { z } from "zod";

export const ASSET_RECORD_FORMAT = "assetlift.asset";
export const ASSET_RECORD_VERSION = 1;
export const COLLECTION_SNAPSHOT_FORMAT = "assetlift.collection";
export const COLLECTION_SNAPSHOT_VERSION = 1;

const Base64Schema = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, "must be base64");
// JSON has no NaN, Infinity or negative zero; those travel as tagged strings.
export const WireFloatSchema = z.union([z.number(), z.enum(["NaN", "Infinity", "-Infinity", "-0"])]);
const FloatMapSchema = z.record(WireFloatSchema);
const CountSchema = z.number().int().nonnegative();

export const TextureRecordSchema = z.object({
  id: z.number().int(),
  width: CountSchema,
  height: CountSchema,
  mipCount: CountSchema,
  meta: FloatMapSchema,
  data: Base64Schema,
});

export const TextureConfigRecordSchema = z.object({
  id: z.number().int(),
  config: Base64Schema,
});

export const AnimationRecordSchema = z.object({
  speed: WireFloatSchema,
  scalars: FloatMapSchema,
  frames: z.array(Base64Schema),
  sounds: z.array(z.number().int()),
  trailer: Base64Schema,
});

export const BoneDataRecordSchema = z.object({
  parent: z.number().int(),
  data: Base64Schema,
});

export const AssetBodySchema = z.object({
  assetId: CountSchema,
  vertexStride: CountSchema,
  vertexCount: CountSchema,
  faceCount: CountSchema,
  vertexBuffer: Base64Schema,
  indexBuffer: Base64Schema,
  boneCount: CountSchema,
  lowPolyBoneCount: CountSchema,
  textureConfigs: z.array(TextureConfigRecordSchema),
  otherTextureConfigs: z.array(TextureConfigRecordSchema),
  animations: z.array(AnimationRecordSchema),
  boneMatrices: z.array(Base64Schema),
  boneData: z.array(BoneDataRecordSchema),
  attachments: z.array(Base64Schema),
  sounds: z.array(Base64Schema),
  indexAttachments: Base64Schema,
  otherBuffer: Base64Schema,
  otherIndexBuffer: Base64Schema,
  weights: Base64Schema,
  boneIds: Base64Schema,
  headerBlock: Base64Schema,
  scalars: FloatMapSchema,
  size: WireFloatSchema,
});

export const AssetRecordSchema = AssetBodySchema.extend({
  format: z.literal(ASSET_RECORD_FORMAT),
  version: z.literal(ASSET_RECORD_VERSION),
  generator: z.string(),
  name: z.string(),
  origin: z.string(),
  textures: z.array(TextureRecordSchema),
});

export const PlacementRecordSchema = z.object({
  instanceId: z.number().int(),
  assetId: z.number().int(),
  auxiliaryIndex: z.number().int(),
  auxiliary: Base64Schema.nullable(),
});

export const CollectionSnapshotSchema = z.object({
  format: z.literal(COLLECTION_SNAPSHOT_FORMAT),
  version: z.literal(COLLECTION_SNAPSHOT_VERSION),
  origin: z.string(),
  textures: z.array(TextureRecordSchema),
  assets: z.array(AssetBodySchema),
  placements: z.array(PlacementRecordSchema),
  auxiliaryTable: z.array(Base64Schema),
});

export const AssetNameTableSchema = z.record(z.array(z.number().int().nonnegative()));

export type WireFloat = z.infer<typeof WireFloatSchema>;
export type TextureRecord = z.infer<typeof TextureRecordSchema>;
export type TextureConfigRecord = z.infer<typeof TextureConfigRecordSchema>;
export type AssetBody = z.infer<typeof AssetBodySchema>;
export type AssetRecord = z.infer<typeof AssetRecordSchema>;
export type CollectionSnapshot = z.infer<typeof CollectionSnapshotSchema>;

export function describeSchemaIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
