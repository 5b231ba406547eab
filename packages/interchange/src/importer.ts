import type { Dirent } from "node:fs";
import { readFile, readdir } from "node:fs/promises";
import { join, resolve } from "node:path";
import { gunzipSync, strFromU8 } from "fflate";
import {
  AssetliftError,
  asAssetliftError,
  base64ToBytes,
  createContentDeduplicator,
  createReferenceRemapper,
  refreshCollectionBookkeeping,
  toErrorPayload,
  type AssetCollection,
  type ErrorPayload,
  type TextureReference,
} from "@assetlift/core";
import { decodeAssetBody, decodeTextureRecord, textureContentTag, type DecodedAssetBody } from "./codec.js";
import { silentLogger, type Logger } from "./logger.js";
import { ASSET_FILE_EXTENSION } from "./names.js";
import { AssetRecordSchema, describeSchemaIssues, type AssetRecord } from "./schema.js";

export interface ImportOptions {
  /** Replace an asset whose id already exists in the destination. */
  overwrite?: boolean;
  digestThreshold?: number;
  logger?: Logger;
}

export type ImportResult =
  | {
    ok: true;
    assetId: number;
    path: string | null;
    replaced: boolean;
    /** Source texture id -> destination pool index. */
    textureMap: Array<[number, number]>;
    appendedTextures: number;
    reusedTextures: number;
    bonesAttached: number;
    warnings: string[];
    /** AL_ERR_REFERENCE entries for texture ids passed through unmapped. */
    referenceIssues: ErrorPayload[];
  }
  | {
    ok: false;
    assetId: number | null;
    path: string | null;
    warnings: string[];
    error: ErrorPayload;
  };

export interface ImportBatchResult {
  ok: boolean;
  results: ImportResult[];
  succeeded: number;
  failed: number;
  error?: ErrorPayload;
}

export type DecodeAssetFileResult =
  | { ok: true; record: AssetRecord }
  | { ok: false; error: ErrorPayload };

const GZIP_MAGIC = [0x1f, 0x8b] as const;

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** Gunzip and parse a JSON payload. Every failure is AL_ERR_FORMAT. */
export function inflateJson(bytes: Uint8Array, label: string): unknown {
  if (bytes.byteLength < 2 || bytes[0] !== GZIP_MAGIC[0] || bytes[1] !== GZIP_MAGIC[1]) {
    throw new AssetliftError("AL_ERR_FORMAT", `${label} is not gzip-compressed.`);
  }
  let text: string;
  try {
    text = strFromU8(gunzipSync(bytes));
  } catch (error) {
    throw asAssetliftError(error, "AL_ERR_FORMAT", `${label} could not be decompressed`);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw asAssetliftError(error, "AL_ERR_FORMAT", `${label} does not contain valid JSON`);
  }
}

export function decodeAssetFile(bytes: Uint8Array, label = "Asset file"): DecodeAssetFileResult {
  let parsed: unknown;
  try {
    parsed = inflateJson(bytes, label);
  } catch (error) {
    return { ok: false, error: toErrorPayload(asAssetliftError(error, "AL_ERR_FORMAT", `${label} is unreadable`)) };
  }
  const result = AssetRecordSchema.safeParse(parsed);
  if (!result.success) {
    return {
      ok: false,
      error: { code: "AL_ERR_FORMAT", message: `${label} is not a valid asset record: ${describeSchemaIssues(result.error)}` },
    };
  }
  return { ok: true, record: result.data };
}

function failure(
  assetId: number | null,
  path: string | null,
  warnings: string[],
  error: AssetliftError,
  logger: Logger,
): ImportResult {
  logger.error(error.message);
  return { ok: false, assetId, path, warnings, error: toErrorPayload(error) };
}

/**
 * Merge one decoded record into the destination. The asset and its textures
 * are rebuilt off to the side first; the destination is only touched once
 * nothing else can fail.
 */
export function importAssetRecord(
  record: AssetRecord,
  destination: AssetCollection | null,
  options: ImportOptions = {},
  path: string | null = null,
): ImportResult {
  const logger = options.logger ?? silentLogger;
  const assetId = record.assetId;
  const warnings: string[] = [];

  if (!destination) {
    return failure(
      assetId,
      path,
      warnings,
      new AssetliftError("AL_ERR_INVALID_INPUT", `No destination collection given for asset ${assetId}.`),
      logger,
    );
  }

  const replaced = destination.assets.some((asset) => asset.id === assetId);
  if (replaced && !options.overwrite) {
    return failure(
      assetId,
      path,
      warnings,
      new AssetliftError(
        "AL_ERR_INVALID_INPUT",
        `Asset ${assetId} already exists in the destination; enable overwrite to replace it.`,
      ),
      logger,
    );
  }

  const remapper = createReferenceRemapper();
  const pool = createContentDeduplicator({ digestThreshold: options.digestThreshold });
  const poolToDestination = new Map<number, number>();
  destination.textures.forEach((texture, index) => {
    const poolIndex = pool.intern(texture.data, textureContentTag(texture));
    if (!poolToDestination.has(poolIndex)) poolToDestination.set(poolIndex, index);
  });

  const referenceIssues: ErrorPayload[] = [];
  const pending: TextureReference[] = [];
  let reusedTextures = 0;
  let decoded: DecodedAssetBody;
  try {
    for (const texture of record.textures) {
      const data = base64ToBytes(texture.data);
      const poolIndex = pool.intern(data, textureContentTag(texture));
      let target = poolToDestination.get(poolIndex);
      if (target === undefined) {
        target = destination.textures.length + pending.length;
        pending.push(decodeTextureRecord(texture, target));
        poolToDestination.set(poolIndex, target);
      } else {
        reusedTextures += 1;
      }
      remapper.record("texture", texture.id, target);
    }

    decoded = decodeAssetBody(record, (sourceId, location) => {
      if (remapper.has("texture", sourceId)) return remapper.resolve("texture", sourceId);
      const warning = `Asset ${assetId} ${location} references texture ${sourceId}, which the file does not embed; keeping the id unchanged.`;
      warnings.push(warning);
      referenceIssues.push({ code: "AL_ERR_REFERENCE", message: warning });
      logger.warn(warning);
      return sourceId;
    });
  } catch (error) {
    return failure(
      assetId,
      path,
      warnings,
      asAssetliftError(error, "AL_ERR_FORMAT", `Asset ${assetId} could not be rebuilt`),
      logger,
    );
  }

  for (const warning of decoded.warnings) {
    warnings.push(warning);
    logger.warn(warning);
  }

  if (replaced) {
    destination.assets = destination.assets.filter((asset) => asset.id !== assetId);
  }
  destination.textures.push(...pending);
  destination.assets.push(decoded.asset);
  refreshCollectionBookkeeping(destination);

  logger.info(
    `Imported asset ${assetId}${path ? ` from ${path}` : ""}: ${pending.length} textures appended, ${reusedTextures} reused.`,
  );
  return {
    ok: true,
    assetId,
    path,
    replaced,
    textureMap: remapper.entries("texture"),
    appendedTextures: pending.length,
    reusedTextures,
    bonesAttached: decoded.bonesAttached,
    warnings,
    referenceIssues,
  };
}

export async function importAssetFile(
  inputPath: string,
  destination: AssetCollection | null,
  options: ImportOptions = {},
): Promise<ImportResult> {
  const logger = options.logger ?? silentLogger;
  const path = resolve(inputPath);
  if (!destination) {
    return failure(
      null,
      path,
      [],
      new AssetliftError("AL_ERR_INVALID_INPUT", `No destination collection given for ${path}.`),
      logger,
    );
  }

  let bytes: Uint8Array;
  try {
    bytes = await readFile(path);
  } catch (error) {
    const wrapped = isMissingFileError(error)
      ? new AssetliftError("AL_ERR_NOT_FOUND", `Asset file ${path} does not exist.`)
      : asAssetliftError(error, "AL_ERR_IO", `Failed to read asset file ${path}`);
    return failure(null, path, [], wrapped, logger);
  }

  const decoded = decodeAssetFile(bytes, `Asset file ${path}`);
  if (!decoded.ok) {
    return failure(null, path, [], new AssetliftError(decoded.error.code, decoded.error.message), logger);
  }
  return importAssetRecord(decoded.record, destination, options, path);
}

/**
 * Import files one after another. A failed file leaves the destination as it
 * was for that file and the batch moves on; earlier successes are kept.
 */
export async function importAssetFiles(
  paths: readonly string[],
  destination: AssetCollection | null,
  options: ImportOptions = {},
): Promise<ImportBatchResult> {
  const logger = options.logger ?? silentLogger;
  if (paths.length === 0) {
    const error = new AssetliftError("AL_ERR_INVALID_INPUT", "No asset files given to import.");
    logger.error(error.message);
    return { ok: false, results: [], succeeded: 0, failed: 0, error: toErrorPayload(error) };
  }

  const results: ImportResult[] = [];
  for (const path of paths) {
    results.push(await importAssetFile(path, destination, options));
  }
  const succeeded = results.filter((result) => result.ok).length;
  const failed = results.length - succeeded;
  logger.info(`Import summary: ${succeeded} imported, ${failed} failed.`);
  return { ok: succeeded > 0, results, succeeded, failed };
}

/** Asset files directly inside `directory`, sorted by path. A missing directory lists nothing. */
export async function listAssetFiles(directory: string): Promise<string[]> {
  const dir = resolve(directory);
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isMissingFileError(error)) return [];
    throw asAssetliftError(error, "AL_ERR_IO", `Failed to list ${dir}`);
  }
  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(ASSET_FILE_EXTENSION))
    .map((entry) => join(dir, entry.name))
    .sort();
}
