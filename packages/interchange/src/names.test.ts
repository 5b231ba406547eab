import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { allocateExportFileNames, friendlyAssetName, loadAssetNameTable, sanitizeFileName } from "./names.js";

describe("asset names", () => {
  it("looks up well-known ids and falls back to the numeric id", () => {
    expect(friendlyAssetName(11)).toBe("Vendor");
    expect(friendlyAssetName(501)).toBe("NanotechCrate");
    expect(friendlyAssetName(3)).toBe("Asset_3");
    expect(friendlyAssetName(3, { Ship: [3] })).toBe("Ship");
  });

  it("replaces characters that are not allowed in file names", () => {
    expect(sanitizeFileName(' a/b:c*? ')).toBe("a_b_c__");
    expect(sanitizeFileName("   ")).toBe("asset");
  });

  it("suffixes repeated display names", () => {
    expect(allocateExportFileNames([500, 12, 500], { Crate: [500, 12] })).toEqual([
      { assetId: 500, name: "Crate", fileName: "Crate_500.alasset" },
      { assetId: 12, name: "Crate_2", fileName: "Crate_2_12.alasset" },
      { assetId: 500, name: "Crate_3", fileName: "Crate_3_500.alasset" },
    ]);
  });

  it("loads a name table from JSON", async () => {
    const dir = await mkdtemp(join(tmpdir(), "assetlift-names-"));
    try {
      const good = join(dir, "names.json");
      const bad = join(dir, "bad.json");
      await writeFile(good, JSON.stringify({ Turret: [77, 78] }));
      await writeFile(bad, JSON.stringify({ Turret: "77" }));

      expect(await loadAssetNameTable(good)).toEqual({ Turret: [77, 78] });
      await expect(loadAssetNameTable(bad)).rejects.toMatchObject({ code: "AL_ERR_FORMAT" });
      await expect(loadAssetNameTable(join(dir, "absent.json"))).rejects.toMatchObject({ code: "AL_ERR_IO" });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
