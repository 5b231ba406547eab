import { resolve } from "node:path";
import { DEFAULT_DIGEST_THRESHOLD } from "@assetlift/core";

export type CompressionLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export const DEFAULT_COMPRESSION_LEVEL: CompressionLevel = 9;

export type AssetliftCommand = "export" | "import" | "validate" | "consolidate";

export interface AssetliftCliConfig {
  command: AssetliftCommand;
  /** Collection file read by export, validate and consolidate. */
  inPath: string | null;
  /** Collection file that import merges into. */
  intoPath: string | null;
  outDir: string | null;
  files: string[];
  dir: string | null;
  savePath: string | null;
  namesPath: string | null;
  assetIds: number[];
  overwrite: boolean;
  compressionLevel: CompressionLevel;
  digestThreshold: number;
}

export interface ParsedCliConfig {
  config: AssetliftCliConfig;
  error?: string;
}

const COMMANDS: readonly AssetliftCommand[] = ["export", "import", "validate", "consolidate"];

function isCommand(value: string): value is AssetliftCommand {
  return COMMANDS.some((command) => command === value);
}

export function isCompressionLevel(value: number): value is CompressionLevel {
  return Number.isInteger(value) && value >= 0 && value <= 9;
}

function createDefaultConfig(command: AssetliftCommand): AssetliftCliConfig {
  return {
    command,
    inPath: null,
    intoPath: null,
    outDir: null,
    files: [],
    dir: null,
    savePath: null,
    namesPath: null,
    assetIds: [],
    overwrite: false,
    compressionLevel: DEFAULT_COMPRESSION_LEVEL,
    digestThreshold: DEFAULT_DIGEST_THRESHOLD,
  };
}

function requireValue(argv: string[], index: number, flag: string): string | { error: string } {
  const value = argv[index + 1];
  if (!value || value.startsWith("--")) {
    return { error: `${flag} requires a value.` };
  }
  return value;
}

export function parseCliConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): ParsedCliConfig {
  const [commandArg, ...rest] = argv;
  if (!commandArg || commandArg === "--help" || commandArg === "-h") {
    return { config: createDefaultConfig("validate"), error: "help" };
  }
  if (!isCommand(commandArg)) {
    return { config: createDefaultConfig("validate"), error: `Unknown command "${commandArg}".` };
  }
  const config = createDefaultConfig(commandArg);

  if (env.ASSETLIFT_COMPRESSION_LEVEL) {
    const level = Number(env.ASSETLIFT_COMPRESSION_LEVEL);
    if (!isCompressionLevel(level)) {
      return { config, error: `Invalid ASSETLIFT_COMPRESSION_LEVEL "${env.ASSETLIFT_COMPRESSION_LEVEL}".` };
    }
    config.compressionLevel = level;
  }
  if (env.ASSETLIFT_DIGEST_THRESHOLD) {
    const threshold = Number(env.ASSETLIFT_DIGEST_THRESHOLD);
    if (!Number.isInteger(threshold) || threshold < 0) {
      return { config, error: `Invalid ASSETLIFT_DIGEST_THRESHOLD "${env.ASSETLIFT_DIGEST_THRESHOLD}".` };
    }
    config.digestThreshold = threshold;
  }
  if (env.ASSETLIFT_OVERWRITE === "1") config.overwrite = true;

  const pathFlags: Record<string, (value: string) => void> = {
    "--in": (value) => {
      config.inPath = resolve(value);
    },
    "--into": (value) => {
      config.intoPath = resolve(value);
    },
    "--out": (value) => {
      config.outDir = resolve(value);
    },
    "--file": (value) => {
      config.files.push(resolve(value));
    },
    "--dir": (value) => {
      config.dir = resolve(value);
    },
    "--save": (value) => {
      config.savePath = resolve(value);
    },
    "--names": (value) => {
      config.namesPath = resolve(value);
    },
  };

  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index];
    if (arg === undefined || arg === "--") {
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      return { config, error: "help" };
    }
    if (arg === "--overwrite") {
      config.overwrite = true;
      continue;
    }
    const setPath = pathFlags[arg];
    if (setPath) {
      const value = requireValue(rest, index, arg);
      if (typeof value !== "string") return { config, ...value };
      setPath(value);
      index += 1;
      continue;
    }
    if (arg === "--id") {
      const value = requireValue(rest, index, arg);
      if (typeof value !== "string") return { config, ...value };
      const id = Number(value);
      if (!Number.isInteger(id) || id < 0) {
        return { config, error: `Invalid --id value "${value}".` };
      }
      config.assetIds.push(id);
      index += 1;
      continue;
    }
    if (arg === "--level") {
      const value = requireValue(rest, index, arg);
      if (typeof value !== "string") return { config, ...value };
      const level = Number(value);
      if (!isCompressionLevel(level)) {
        return { config, error: `Invalid --level value "${value}".` };
      }
      config.compressionLevel = level;
      index += 1;
      continue;
    }
    return { config, error: `Unknown flag "${arg}".` };
  }

  const missing = checkRequiredFlags(config);
  return missing ? { config, error: missing } : { config };
}

function checkRequiredFlags(config: AssetliftCliConfig): string | null {
  switch (config.command) {
    case "export":
      if (!config.inPath) return "export requires --in <collection>.";
      if (!config.outDir) return "export requires --out <dir>.";
      return null;
    case "import":
      if (!config.intoPath) return "import requires --into <collection>.";
      if (config.files.length === 0 && !config.dir) return "import requires --file <path> or --dir <path>.";
      if (config.files.length > 0 && config.dir) return "import takes either --file or --dir, not both.";
      return null;
    case "validate":
    case "consolidate":
      return config.inPath ? null : `${config.command} requires --in <collection>.`;
  }
}

export function renderHelpText(): string {
  return [
    "assetlift",
    "",
    "Usage:",
    "  assetlift export --in <collection.alcol> --out <dir> [--id <n>]... [--names <table.json>] [--level 0-9]",
    "  assetlift import --into <collection.alcol> (--file <asset.alasset>... | --dir <dir>) [--overwrite] [--save <path>]",
    "  assetlift validate --in <collection.alcol>",
    "  assetlift consolidate --in <collection.alcol> [--save <path>]",
    "",
    "Environment:",
    "  ASSETLIFT_COMPRESSION_LEVEL   gzip level for exported files (default 9).",
    "  ASSETLIFT_DIGEST_THRESHOLD    byte size from which blocks are compared by digest (default 1024).",
    "  ASSETLIFT_OVERWRITE=1         replace assets whose id already exists.",
  ].join("\n");
}
