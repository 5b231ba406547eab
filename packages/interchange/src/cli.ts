#!/usr/bin/env node
import { pathToFileURL } from "node:url";
import {
  AssetliftError,
  asAssetliftError,
  consolidateAuxiliaryBlocks,
  stableJsonStringify,
  toErrorPayload,
  validateCollection,
} from "@assetlift/core";
import { parseCliConfig, renderHelpText, type AssetliftCliConfig, type AssetliftCommand } from "./config.js";
import { importAssetFiles, listAssetFiles } from "./importer.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { WELL_KNOWN_ASSET_NAMES, loadAssetNameTable } from "./names.js";
import { exportCollection } from "./serialize.js";
import { createSnapshotCodec, type ContainerCodec } from "./snapshot.js";

export interface CliIo {
  writeStdout: (line: string) => void;
  writeStderr: (line: string) => void;
}

export interface CliDeps {
  codec?: ContainerCodec;
  env?: NodeJS.ProcessEnv;
  /** Prefix diagnostic lines with a clock time. */
  timestamps?: boolean;
}

const defaultIo: CliIo = {
  writeStdout: (line) => process.stdout.write(`${line}\n`),
  writeStderr: (line) => process.stderr.write(`${line}\n`),
};

/** Exit code for a collection that loaded fine but failed validation. */
const EXIT_INTEGRITY_VIOLATION = 2;

interface CommandOutcome {
  exitCode: number;
  summary: Record<string, unknown>;
}

function requirePath(value: string | null, flag: string): string {
  if (!value) throw new AssetliftError("AL_ERR_INVALID_INPUT", `${flag} is required.`);
  return value;
}

async function runExport(config: AssetliftCliConfig, codec: ContainerCodec, logger: Logger): Promise<CommandOutcome> {
  const collection = await codec.load(requirePath(config.inPath, "--in"));
  const names = config.namesPath ? await loadAssetNameTable(config.namesPath) : WELL_KNOWN_ASSET_NAMES;
  const result = await exportCollection(collection, requirePath(config.outDir, "--out"), {
    assetIds: config.assetIds.length > 0 ? config.assetIds : undefined,
    names,
    compressionLevel: config.compressionLevel,
    logger,
  });
  return {
    exitCode: result.ok ? 0 : 1,
    summary: {
      ok: result.ok,
      command: "export",
      outDir: result.outDir,
      exported: result.results.flatMap((entry) => (entry.ok ? [entry.path] : [])),
      errors: [
        ...(result.error ? [result.error] : []),
        ...result.results.flatMap((entry) => (entry.ok ? [] : [entry.error])),
      ],
    },
  };
}

async function runImport(config: AssetliftCliConfig, codec: ContainerCodec, logger: Logger): Promise<CommandOutcome> {
  const intoPath = requirePath(config.intoPath, "--into");
  const destination = await codec.load(intoPath);
  const paths = config.dir ? await listAssetFiles(config.dir) : config.files;
  const batch = await importAssetFiles(paths, destination, {
    overwrite: config.overwrite,
    digestThreshold: config.digestThreshold,
    logger,
  });

  let savedTo: string | null = null;
  if (batch.succeeded > 0) {
    savedTo = config.savePath ?? intoPath;
    await codec.save(destination, savedTo);
    logger.info(`Saved collection to ${savedTo}.`);
  }
  return {
    exitCode: batch.ok ? 0 : 1,
    summary: {
      ok: batch.ok,
      command: "import",
      imported: batch.results.flatMap((entry) => (entry.ok ? [entry.assetId] : [])),
      savedTo,
      errors: [
        ...(batch.error ? [batch.error] : []),
        ...batch.results.flatMap((entry) => (entry.ok ? [] : [entry.error])),
      ],
    },
  };
}

async function runValidate(config: AssetliftCliConfig, codec: ContainerCodec, logger: Logger): Promise<CommandOutcome> {
  const collection = await codec.load(requirePath(config.inPath, "--in"));
  const report = validateCollection(collection);
  for (const violation of report.violations) logger.warn(violation.message);
  return {
    exitCode: report.ok ? 0 : EXIT_INTEGRITY_VIOLATION,
    summary: {
      ok: report.ok,
      command: "validate",
      violations: report.violations.map((violation) => violation.message),
    },
  };
}

async function runConsolidate(config: AssetliftCliConfig, codec: ContainerCodec, logger: Logger): Promise<CommandOutcome> {
  const inPath = requirePath(config.inPath, "--in");
  const collection = await codec.load(inPath);
  const result = consolidateAuxiliaryBlocks(collection, { digestThreshold: config.digestThreshold });
  const savedTo = config.savePath ?? inPath;
  await codec.save(collection, savedTo);
  logger.info(
    `Consolidated ${collection.placements.length} placements into ${result.table.length} auxiliary blocks; saved to ${savedTo}.`,
  );
  return {
    exitCode: 0,
    summary: {
      ok: true,
      command: "consolidate",
      auxiliaryBlocks: result.table.length,
      emptyRecords: result.emptyRecords,
      savedTo,
    },
  };
}

const COMMAND_RUNNERS: Record<
  AssetliftCommand,
  (config: AssetliftCliConfig, codec: ContainerCodec, logger: Logger) => Promise<CommandOutcome>
> = {
  export: runExport,
  import: runImport,
  validate: runValidate,
  consolidate: runConsolidate,
};

export async function runAssetliftCli(argv: string[], io: CliIo = defaultIo, deps: CliDeps = {}): Promise<number> {
  const parsed = parseCliConfig(argv, deps.env ?? process.env);
  if (parsed.error === "help") {
    io.writeStdout(renderHelpText());
    return 0;
  }
  if (parsed.error) {
    io.writeStderr(parsed.error);
    io.writeStdout(renderHelpText());
    return 1;
  }

  const { config } = parsed;
  const codec = deps.codec ?? createSnapshotCodec({ compressionLevel: config.compressionLevel });
  // Diagnostics go to stderr; stdout carries only the JSON summary.
  const logger = createConsoleLogger({
    sink: { writeStdout: io.writeStderr, writeStderr: io.writeStderr },
    timestamps: deps.timestamps ?? true,
  });

  let outcome: CommandOutcome;
  try {
    outcome = await COMMAND_RUNNERS[config.command](config, codec, logger);
  } catch (error) {
    const failure = asAssetliftError(error, "AL_ERR_IO", `${config.command} failed`);
    io.writeStderr(`${failure.code}: ${failure.message}`);
    io.writeStdout(stableJsonStringify({ ok: false, command: config.command, errors: [toErrorPayload(failure)] }));
    return 1;
  }

  io.writeStdout(stableJsonStringify(outcome.summary));
  return outcome.exitCode;
}

async function main() {
  const exitCode = await runAssetliftCli(process.argv.slice(2), defaultIo);
  process.exitCode = exitCode;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
}
