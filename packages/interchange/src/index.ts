export { ASSETLIFT_VERSION } from "./version.js";
export {
  ASSET_RECORD_FORMAT,
  ASSET_RECORD_VERSION,
  AssetRecordSchema,
  COLLECTION_SNAPSHOT_FORMAT,
  COLLECTION_SNAPSHOT_VERSION,
  CollectionSnapshotSchema,
  WireFloatSchema,
  describeSchemaIssues,
} from "./schema.js";
export type {
  AssetBody,
  AssetRecord,
  CollectionSnapshot,
  TextureConfigRecord,
  TextureRecord,
  WireFloat,
} from "./schema.js";
export {
  decodeAssetBody,
  decodeFloat,
  decodeTextureRecord,
  encodeAssetBody,
  encodeFloat,
  encodeTextureRecord,
  textureContentTag,
} from "./codec.js";
export type { DecodedAssetBody, TextureIdResolver } from "./codec.js";
export {
  ASSET_FILE_EXTENSION,
  WELL_KNOWN_ASSET_NAMES,
  allocateExportFileNames,
  friendlyAssetName,
  loadAssetNameTable,
  sanitizeFileName,
} from "./names.js";
export type { AssetNameTable } from "./names.js";
export { compressJson, encodeAssetRecord, exportAsset, exportCollection, serializeAssetRecord } from "./serialize.js";
export type {
  EncodeAssetOptions,
  EncodedAsset,
  ExportAssetOptions,
  ExportCollectionOptions,
  ExportCollectionResult,
  ExportResult,
} from "./serialize.js";
export {
  decodeAssetFile,
  importAssetFile,
  importAssetFiles,
  importAssetRecord,
  inflateJson,
  listAssetFiles,
} from "./importer.js";
export type { DecodeAssetFileResult, ImportBatchResult, ImportOptions, ImportResult } from "./importer.js";
export {
  COLLECTION_FILE_EXTENSION,
  createSnapshotCodec,
  decodeCollectionSnapshot,
  encodeCollectionSnapshot,
} from "./snapshot.js";
export type { ContainerCodec, SnapshotCodecOptions } from "./snapshot.js";
export { createConsoleLogger, silentLogger } from "./logger.js";
export type { ConsoleLoggerOptions, LogSink, Logger } from "./logger.js";
export { DEFAULT_COMPRESSION_LEVEL, isCompressionLevel, parseCliConfig, renderHelpText } from "./config.js";
export type { AssetliftCliConfig, AssetliftCommand, CompressionLevel, ParsedCliConfig } from "./config.js";
export { runAssetliftCli } from "./cli.js";
export type { CliDeps, CliIo } from "./cli.js";
