import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import {
  AssetliftError,
  asAssetliftError,
  base64ToBytes,
  bytesToBase64,
  createAssetCollection,
  refreshCollectionBookkeeping,
  type AssetCollection,
} from "@assetlift/core";
import { decodeAssetBody, decodeTextureRecord, encodeAssetBody, encodeTextureRecord } from "./codec.js";
import { DEFAULT_COMPRESSION_LEVEL, type CompressionLevel } from "./config.js";
import { inflateJson } from "./importer.js";
import {
  COLLECTION_SNAPSHOT_FORMAT,
  COLLECTION_SNAPSHOT_VERSION,
  CollectionSnapshotSchema,
  describeSchemaIssues,
  type CollectionSnapshot,
} from "./schema.js";
import { compressJson } from "./serialize.js";

export const COLLECTION_FILE_EXTENSION = ".alcol";

/**
 * Loads and saves whole collections. Implementations throw AssetliftError
 * (AL_ERR_NOT_FOUND, AL_ERR_FORMAT or AL_ERR_IO).
 */
export interface ContainerCodec {
  load(path: string): Promise<AssetCollection>;
  save(collection: AssetCollection, path: string): Promise<void>;
}

export function encodeCollectionSnapshot(collection: AssetCollection): CollectionSnapshot {
  return {
    format: COLLECTION_SNAPSHOT_FORMAT,
    version: COLLECTION_SNAPSHOT_VERSION,
    origin: collection.origin,
    textures: collection.textures.map((texture, index) => encodeTextureRecord(texture, index)),
    assets: collection.assets.map(encodeAssetBody),
    placements: collection.placements.map((placement) => ({
      instanceId: placement.instanceId,
      assetId: placement.assetId,
      auxiliaryIndex: placement.auxiliaryIndex,
      auxiliary: placement.auxiliary ? bytesToBase64(placement.auxiliary) : null,
    })),
    auxiliaryTable: collection.auxiliaryTable.map((block) => bytesToBase64(block)),
  };
}

/** Texture ids in a snapshot are already pool indices, so they pass through. */
export function decodeCollectionSnapshot(snapshot: CollectionSnapshot): AssetCollection {
  const collection = createAssetCollection({
    origin: snapshot.origin,
    textures: snapshot.textures.map((texture, index) => decodeTextureRecord(texture, index)),
    assets: snapshot.assets.map((body) => decodeAssetBody(body, (sourceId) => sourceId).asset),
    placements: snapshot.placements.map((placement) => ({
      instanceId: placement.instanceId,
      assetId: placement.assetId,
      asset: null,
      auxiliaryIndex: placement.auxiliaryIndex,
      auxiliary: placement.auxiliary === null ? null : base64ToBytes(placement.auxiliary),
    })),
    auxiliaryTable: snapshot.auxiliaryTable.map((block) => base64ToBytes(block)),
  });
  refreshCollectionBookkeeping(collection);
  return collection;
}

export interface SnapshotCodecOptions {
  compressionLevel?: CompressionLevel;
}

export function createSnapshotCodec(options: SnapshotCodecOptions = {}): ContainerCodec {
  const level = options.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL;
  return {
    async load(inputPath) {
      const path = resolve(inputPath);
      let bytes: Uint8Array;
      try {
        bytes = await readFile(path);
      } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
          throw new AssetliftError("AL_ERR_NOT_FOUND", `Collection file ${path} does not exist.`);
        }
        throw asAssetliftError(error, "AL_ERR_IO", `Failed to read collection ${path}`);
      }
      const result = CollectionSnapshotSchema.safeParse(inflateJson(bytes, `Collection file ${path}`));
      if (!result.success) {
        throw new AssetliftError(
          "AL_ERR_FORMAT",
          `Collection file ${path} is not a valid snapshot: ${describeSchemaIssues(result.error)}`,
        );
      }
      try {
        return decodeCollectionSnapshot(result.data);
      } catch (error) {
        throw asAssetliftError(error, "AL_ERR_FORMAT", `Collection file ${path} could not be rebuilt`);
      }
    },
    async save(collection, outputPath) {
      const path = resolve(outputPath);
      const bytes = compressJson(encodeCollectionSnapshot(collection), level);
      try {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, bytes);
      } catch (error) {
        throw asAssetliftError(error, "AL_ERR_IO", `Failed to write collection ${path}`);
      }
    },
  };
}
