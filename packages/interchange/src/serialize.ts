import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { gzipSync, strToU8 } from "fflate";
import {
  AssetliftError,
  asAssetliftError,
  stableJsonStringify,
  toErrorPayload,
  type Asset,
  type AssetCollection,
  type ErrorPayload,
  type TextureReference,
} from "@assetlift/core";
import { encodeAssetBody, encodeTextureRecord } from "./codec.js";
import { DEFAULT_COMPRESSION_LEVEL, type CompressionLevel } from "./config.js";
import { silentLogger, type Logger } from "./logger.js";
import { WELL_KNOWN_ASSET_NAMES, allocateExportFileNames, friendlyAssetName, type AssetNameTable } from "./names.js";
import { ASSET_RECORD_FORMAT, ASSET_RECORD_VERSION, type AssetRecord, type TextureRecord } from "./schema.js";
import { ASSETLIFT_VERSION } from "./version.js";

// Fixed gzip header timestamp so identical assets compress to identical files.
const GZIP_MTIME = Date.UTC(2000, 0, 1);

export interface EncodeAssetOptions {
  origin: string;
  name: string;
}

export interface EncodedAsset {
  record: AssetRecord;
  embeddedTextureIds: number[];
  warnings: string[];
  /** AL_ERR_REFERENCE entries for configs whose texture is not in the pool. */
  referenceIssues: ErrorPayload[];
}

/**
 * Build the self-contained record for one asset. Every texture referenced by
 * either config list is embedded once, with its full texel bytes.
 */
export function encodeAssetRecord(
  asset: Asset,
  textures: readonly TextureReference[],
  options: EncodeAssetOptions,
): EncodedAsset {
  const warnings: string[] = [];
  const referenceIssues: ErrorPayload[] = [];
  const embedded = new Map<number, TextureRecord>();
  const missing = new Set<number>();

  for (const config of [...asset.textureConfigs, ...asset.otherTextureConfigs]) {
    const id = config.textureId;
    if (embedded.has(id) || missing.has(id)) continue;
    const texture = Number.isInteger(id) && id >= 0 ? textures[id] : undefined;
    if (!texture) {
      missing.add(id);
      const message = `Asset ${asset.id} references texture ${id}, outside the texture pool of ${textures.length}; the config is kept without texel data.`;
      warnings.push(message);
      referenceIssues.push({ code: "AL_ERR_REFERENCE", message });
      continue;
    }
    embedded.set(id, encodeTextureRecord(texture, id));
  }

  const record: AssetRecord = {
    format: ASSET_RECORD_FORMAT,
    version: ASSET_RECORD_VERSION,
    generator: `assetlift/${ASSETLIFT_VERSION}`,
    name: options.name,
    origin: options.origin,
    ...encodeAssetBody(asset),
    textures: [...embedded.values()],
  };

  return { record, embeddedTextureIds: [...embedded.keys()], warnings, referenceIssues };
}

export function compressJson(value: unknown, level: CompressionLevel = DEFAULT_COMPRESSION_LEVEL): Uint8Array {
  return gzipSync(strToU8(stableJsonStringify(value)), { level, mtime: GZIP_MTIME });
}

export function serializeAssetRecord(record: AssetRecord, level: CompressionLevel = DEFAULT_COMPRESSION_LEVEL): Uint8Array {
  return compressJson(record, level);
}

export interface ExportAssetOptions {
  origin?: string;
  name?: string;
  names?: AssetNameTable;
  compressionLevel?: CompressionLevel;
  logger?: Logger;
}

export type ExportResult =
  | {
    ok: true;
    assetId: number;
    path: string;
    bytes: number;
    embeddedTextureIds: number[];
    warnings: string[];
    referenceIssues: ErrorPayload[];
  }
  | {
    ok: false;
    assetId: number | null;
    path: string;
    warnings: string[];
    error: ErrorPayload;
  };

export async function exportAsset(
  asset: Asset | null,
  textures: readonly TextureReference[],
  outputPath: string,
  options: ExportAssetOptions = {},
): Promise<ExportResult> {
  const logger = options.logger ?? silentLogger;
  const path = resolve(outputPath);
  if (!asset) {
    const error = new AssetliftError("AL_ERR_INVALID_INPUT", `No asset given for export to ${path}.`);
    logger.error(error.message);
    return { ok: false, assetId: null, path, warnings: [], error: toErrorPayload(error) };
  }

  const encoded = encodeAssetRecord(asset, textures, {
    origin: options.origin ?? "unknown",
    name: options.name ?? friendlyAssetName(asset.id, options.names ?? WELL_KNOWN_ASSET_NAMES),
  });
  for (const warning of encoded.warnings) logger.warn(warning);

  try {
    const bytes = serializeAssetRecord(encoded.record, options.compressionLevel);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, bytes);
    logger.info(`Exported asset ${asset.id} to ${path} (${bytes.byteLength} bytes).`);
    return {
      ok: true,
      assetId: asset.id,
      path,
      bytes: bytes.byteLength,
      embeddedTextureIds: encoded.embeddedTextureIds,
      warnings: encoded.warnings,
      referenceIssues: encoded.referenceIssues,
    };
  } catch (error) {
    const failure = asAssetliftError(error, "AL_ERR_IO", `Failed to write asset ${asset.id} to ${path}`);
    logger.error(failure.message);
    return { ok: false, assetId: asset.id, path, warnings: encoded.warnings, error: toErrorPayload(failure) };
  }
}

export interface ExportCollectionOptions extends Omit<ExportAssetOptions, "name" | "origin"> {
  /** Restrict the export to these asset ids. */
  assetIds?: readonly number[];
}

export interface ExportCollectionResult {
  ok: boolean;
  outDir: string;
  results: ExportResult[];
  succeeded: number;
  failed: number;
  error?: ErrorPayload;
}

export async function exportCollection(
  collection: AssetCollection,
  outDir: string,
  options: ExportCollectionOptions = {},
): Promise<ExportCollectionResult> {
  const logger = options.logger ?? silentLogger;
  const dir = resolve(outDir);
  const wanted = options.assetIds ? new Set(options.assetIds) : null;
  const assets = collection.assets.filter((asset) => !wanted || wanted.has(asset.id));
  if (assets.length === 0) {
    const error = new AssetliftError("AL_ERR_NOT_FOUND", "No assets to export from the collection.");
    logger.error(error.message);
    return { ok: false, outDir: dir, results: [], succeeded: 0, failed: 0, error: toErrorPayload(error) };
  }

  const names = options.names ?? WELL_KNOWN_ASSET_NAMES;
  const files = allocateExportFileNames(assets.map((asset) => asset.id), names);
  const results: ExportResult[] = [];
  for (const [index, asset] of assets.entries()) {
    const file = files[index];
    if (!file) break;
    results.push(
      await exportAsset(asset, collection.textures, join(dir, file.fileName), {
        ...options,
        origin: collection.origin,
        name: file.name,
      }),
    );
  }

  const succeeded = results.filter((result) => result.ok).length;
  const failed = results.length - succeeded;
  logger.info(`Export summary: ${succeeded} exported, ${failed} failed, output ${dir}.`);
  return { ok: succeeded > 0, outDir: dir, results, succeeded, failed };
}
