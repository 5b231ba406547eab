import { readFile } from "node:fs/promises";
import { AssetliftError } from "@assetlift/core";
import { AssetNameTableSchema, describeSchemaIssues } from "./schema.js";

export const ASSET_FILE_EXTENSION = ".alasset";

/** Display name -> asset ids that carry it. Used only to name exported files. */
export type AssetNameTable = Readonly<Record<string, readonly number[]>>;

export const WELL_KNOWN_ASSET_NAMES: AssetNameTable = {
  Vendor: [11],
  VendorLogo: [1143],
  Crate: [500],
  AmmoCrate: [511],
  NanotechCrate: [512, 501],
  SwingshotNode: [803],
  SwingshotPull: [758],
};

export function friendlyAssetName(assetId: number, table: AssetNameTable = WELL_KNOWN_ASSET_NAMES): string {
  for (const [name, ids] of Object.entries(table)) {
    if (ids.includes(assetId)) return name;
  }
  return `Asset_${assetId}`;
}

export function sanitizeFileName(name: string): string {
  const out = name.trim().replace(/[<>:"/\\|?*\u0000-\u001f]/g, "_");
  return out.length > 0 ? out : "asset";
}

/**
 * Assign one file name per asset in order. Repeated display names get `_2`,
 * `_3`... before the id suffix.
 */
export function allocateExportFileNames(
  assetIds: readonly number[],
  table: AssetNameTable = WELL_KNOWN_ASSET_NAMES,
): Array<{ assetId: number; name: string; fileName: string }> {
  const seen = new Map<string, number>();
  return assetIds.map((assetId) => {
    const baseName = friendlyAssetName(assetId, table);
    const count = (seen.get(baseName) ?? 0) + 1;
    seen.set(baseName, count);
    const name = count > 1 ? `${baseName}_${count}` : baseName;
    return {
      assetId,
      name,
      fileName: `${sanitizeFileName(name)}_${assetId}${ASSET_FILE_EXTENSION}`,
    };
  });
}

export async function loadAssetNameTable(path: string): Promise<AssetNameTable> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new AssetliftError(
      "AL_ERR_IO",
      `Failed to read name table ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new AssetliftError("AL_ERR_FORMAT", `Name table ${path} is not valid JSON.`);
  }
  const result = AssetNameTableSchema.safeParse(parsed);
  if (!result.success) {
    throw new AssetliftError("AL_ERR_FORMAT", `Name table ${path} is invalid: ${describeSchemaIssues(result.error)}`);
  }
  return result.data;
}
