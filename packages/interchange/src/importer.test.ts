import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync, strToU8 } from "fflate";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  createAsset,
  createAssetCollection,
  createPlacement,
  createTextureConfig,
  flattenSkeleton,
  type AssetCollection,
} from "@assetlift/core";
import { importAssetFile, importAssetFiles, importAssetRecord, listAssetFiles } from "./importer.js";
import { compressJson, encodeAssetRecord, exportAsset } from "./serialize.js";
import {
  createScenarioAsset,
  createScenarioCollection,
  createSingleTextureCollection,
  createTexture,
  filledBytes,
} from "./__tests__/fixtures.js";

let dir = "";

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "assetlift-import-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function exportFrom(collection: AssetCollection, assetId: number, fileName: string): Promise<string> {
  const path = join(dir, fileName);
  const asset = collection.assets.find((entry) => entry.id === assetId) ?? null;
  const result = await exportAsset(asset, collection.textures, path);
  if (!result.ok) throw new Error(result.error.message);
  return path;
}

describe("importAssetFile", () => {
  it("imports the exported scenario asset into an empty collection", async () => {
    const path = await exportFrom(createScenarioCollection(), 42, "scenario.alasset");
    const destination = createAssetCollection();

    const result = await importAssetFile(path, destination);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.assetId).toBe(42);
    expect(result.replaced).toBe(false);
    expect(result.textureMap).toEqual([
      [0, 0],
      [1, 1],
    ]);
    expect(result.appendedTextures).toBe(2);
    expect(result.reusedTextures).toBe(0);
    expect(result.bonesAttached).toBe(3);
    expect(result.warnings).toEqual([]);
    expect(result.referenceIssues).toEqual([]);
    expect(destination.assets.map((asset) => asset.id)).toEqual([42]);
    expect(destination.assetIds).toEqual([42]);
    expect(destination.textures).toHaveLength(2);
    expect(destination.textures.map((texture) => texture.id)).toEqual([0, 1]);
    expect(flattenSkeleton(destination.assets[0]?.skeleton ?? null)).toEqual([
      [0, -1],
      [1, 0],
      [2, 0],
    ]);
  });

  it("reproduces every field of the source asset", async () => {
    const path = await exportFrom(createScenarioCollection(), 42, "scenario.alasset");
    const destination = createAssetCollection();

    await importAssetFile(path, destination);

    expect(destination.assets[0]).toEqual(createScenarioAsset());
    expect(destination.textures[1]?.data).toEqual(filledBytes(10, 11));
    expect(destination.textures[1]?.meta).toEqual({ vramOffset: 16 });
  });

  it("carries NaN, infinite and negative-zero floats through export and import", async () => {
    const source = createScenarioCollection();
    const asset = createScenarioAsset();
    asset.scalars.unk1 = NaN;
    asset.size = -0;
    const animation = asset.animations[0];
    const texture = source.textures[0];
    if (!animation || !texture) throw new Error("fixture missing animation or texture");
    animation.speed = Infinity;
    texture.meta = { vramOffset: -Infinity };
    source.assets = [asset];
    const path = await exportFrom(source, 42, "floats.alasset");
    const destination = createAssetCollection();

    const result = await importAssetFile(path, destination);

    expect(result.ok).toBe(true);
    const imported = destination.assets[0];
    expect(imported?.scalars.unk1).toBeNaN();
    expect(imported?.animations[0]?.speed).toBe(Infinity);
    expect(Object.is(imported?.size, -0)).toBe(true);
    expect(destination.textures[0]?.meta.vramOffset).toBe(-Infinity);
    expect(imported).toEqual(asset);
  });

  it("remaps texture ids onto textures already in the destination", async () => {
    const source = createScenarioCollection();
    const path = await exportFrom(source, 42, "scenario.alasset");
    const unrelated = createTexture(8, 8, filledBytes(64, 99));
    const textureB = source.textures[1];
    if (!textureB) throw new Error("fixture missing texture 1");
    const destination = createAssetCollection({ textures: [unrelated, { ...textureB, id: 1 }] });

    const result = await importAssetFile(path, destination);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.textureMap).toEqual([
      [0, 2],
      [1, 1],
    ]);
    expect(result.reusedTextures).toBe(1);
    expect(destination.textures).toHaveLength(3);
    expect(destination.textures[2]?.id).toBe(2);
    const asset = destination.assets[0];
    expect(asset?.textureConfigs.map((config) => config.textureId)).toEqual([2, 1]);
    expect(asset?.otherTextureConfigs.map((config) => config.textureId)).toEqual([1]);
  });

  it("merges byte-identical 64x64 textures from two assets into one", async () => {
    const texels = filledBytes(64 * 64, 5);
    const first = await exportFrom(createSingleTextureCollection(10, createTexture(64, 64, texels)), 10, "a.alasset");
    const second = await exportFrom(createSingleTextureCollection(11, createTexture(64, 64, texels)), 11, "b.alasset");
    const destination = createAssetCollection();

    await importAssetFile(first, destination);
    const result = await importAssetFile(second, destination);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.appendedTextures).toBe(0);
      expect(result.reusedTextures).toBe(1);
    }
    expect(destination.textures).toHaveLength(1);
    expect(destination.assets.map((asset) => asset.textureConfigs[0]?.textureId)).toEqual([0, 0]);
  });

  it("keeps same-byte textures apart when their dimensions differ", async () => {
    const texels = filledBytes(64 * 64, 5);
    const first = await exportFrom(createSingleTextureCollection(10, createTexture(64, 64, texels)), 10, "a.alasset");
    const second = await exportFrom(createSingleTextureCollection(11, createTexture(32, 128, texels)), 11, "b.alasset");
    const destination = createAssetCollection();

    await importAssetFile(first, destination);
    await importAssetFile(second, destination);

    expect(destination.textures).toHaveLength(2);
    expect(destination.assets.map((asset) => asset.textureConfigs[0]?.textureId)).toEqual([0, 1]);
  });

  it("refuses an existing id unless overwrite is set", async () => {
    const path = await exportFrom(createScenarioCollection(), 42, "scenario.alasset");
    const destination = createAssetCollection({ placements: [createPlacement(3, 42)] });
    await importAssetFile(path, destination);
    const original = destination.assets[0];

    const refused = await importAssetFile(path, destination);

    expect(refused.ok).toBe(false);
    if (!refused.ok) {
      expect(refused.error).toEqual({
        code: "AL_ERR_INVALID_INPUT",
        message: "Asset 42 already exists in the destination; enable overwrite to replace it.",
      });
    }
    expect(destination.assets).toHaveLength(1);
    expect(destination.assets[0]).toBe(original);
    expect(destination.textures).toHaveLength(2);

    const replaced = await importAssetFile(path, destination, { overwrite: true });

    expect(replaced.ok).toBe(true);
    if (replaced.ok) expect(replaced.replaced).toBe(true);
    expect(destination.assets).toHaveLength(1);
    expect(destination.assets[0]).not.toBe(original);
    expect(destination.textures).toHaveLength(2);
    expect(destination.placements[0]?.asset).toBe(destination.assets[0]);
  });

  it("reports a missing file as AL_ERR_NOT_FOUND", async () => {
    const path = join(dir, "absent.alasset");

    const result = await importAssetFile(path, createAssetCollection());

    expect(result).toEqual({
      ok: false,
      assetId: null,
      path,
      warnings: [],
      error: { code: "AL_ERR_NOT_FOUND", message: `Asset file ${path} does not exist.` },
    });
  });

  it("reports a missing destination as AL_ERR_INVALID_INPUT", async () => {
    const path = await exportFrom(createScenarioCollection(), 42, "scenario.alasset");

    const result = await importAssetFile(path, null);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toEqual({
        code: "AL_ERR_INVALID_INPUT",
        message: `No destination collection given for ${path}.`,
      });
    }
  });

  it("rejects malformed files without touching the destination", async () => {
    const notGzip = join(dir, "plain.alasset");
    const badJson = join(dir, "json.alasset");
    const badShape = join(dir, "shape.alasset");
    await writeFile(notGzip, "plain text");
    await writeFile(badJson, gzipSync(strToU8("{")));
    await writeFile(badShape, compressJson({ format: "something-else" }));
    const destination = createScenarioCollection();

    const results = await Promise.all([
      importAssetFile(notGzip, destination),
      importAssetFile(badJson, destination),
      importAssetFile(badShape, destination),
    ]);

    const errors = results.map((result) => (result.ok ? null : result.error));
    expect(errors[0]).toEqual({ code: "AL_ERR_FORMAT", message: `Asset file ${notGzip} is not gzip-compressed.` });
    expect(errors[1]?.code).toBe("AL_ERR_FORMAT");
    expect(errors[1]?.message.startsWith(`Asset file ${badJson} does not contain valid JSON: `)).toBe(true);
    expect(errors[2]?.code).toBe("AL_ERR_FORMAT");
    expect(errors[2]?.message.startsWith(`Asset file ${badShape} is not a valid asset record: `)).toBe(true);
    expect(destination.assets.map((asset) => asset.id)).toEqual([42]);
    expect(destination.textures).toHaveLength(2);
  });
});

describe("importAssetRecord", () => {
  it("passes unknown texture ids through with a warning", () => {
    const asset = createAsset({ id: 7, vertexStride: 16, textureConfigs: [createTextureConfig(5)] });
    const { record } = encodeAssetRecord(asset, [], { origin: "o", name: "n" });
    const destination = createAssetCollection();

    const result = importAssetRecord(record, destination);

    expect(result.ok).toBe(true);
    expect(result.warnings).toEqual([
      "Asset 7 textureConfigs[0] references texture 5, which the file does not embed; keeping the id unchanged.",
    ]);
    if (result.ok) {
      expect(result.referenceIssues).toEqual([
        {
          code: "AL_ERR_REFERENCE",
          message: "Asset 7 textureConfigs[0] references texture 5, which the file does not embed; keeping the id unchanged.",
        },
      ]);
    }
    expect(destination.assets[0]?.textureConfigs[0]?.textureId).toBe(5);
  });

  it("stages textures so a failed rebuild leaves the destination unchanged", () => {
    const source = createScenarioCollection();
    const { record } = encodeAssetRecord(createScenarioAsset(), source.textures, { origin: "o", name: "n" });
    const broken = { ...record, vertexBuffer: "AQID" };
    const destination = createAssetCollection();

    const result = importAssetRecord(broken, destination);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toEqual({
        code: "AL_ERR_FORMAT",
        message: "Asset 42 vertex buffer byte length 3 is not a multiple of 4.",
      });
    }
    expect(destination.textures).toEqual([]);
    expect(destination.assets).toEqual([]);
  });

  it("keeps the skeleton that was attached when a parent is malformed", () => {
    const asset = createScenarioAsset();
    asset.boneData[2] = { parent: 5, data: filledBytes(16, 30) };
    const { record } = encodeAssetRecord(asset, [], { origin: "o", name: "n" });
    const destination = createAssetCollection();

    const result = importAssetRecord(record, destination);

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.bonesAttached).toBe(2);
    expect(result.warnings).toContain(
      "Asset 42: Bone 2 has parent 5, which is not an earlier bone; skeleton truncated at 2 bones.",
    );
    expect(flattenSkeleton(destination.assets[0]?.skeleton ?? null)).toEqual([
      [0, -1],
      [1, 0],
    ]);
  });
});

describe("importAssetFiles", () => {
  it("continues past failed files and succeeds when any file imported", async () => {
    const good = await exportFrom(createScenarioCollection(), 42, "good.alasset");
    const missing = join(dir, "missing.alasset");
    const other = await exportFrom(
      createAssetCollection({ assets: [createAsset({ id: 500, vertexStride: 16 })] }),
      500,
      "crate.alasset",
    );
    const destination = createAssetCollection();

    const batch = await importAssetFiles([good, missing, other], destination);

    expect(batch.ok).toBe(true);
    expect(batch.succeeded).toBe(2);
    expect(batch.failed).toBe(1);
    expect(batch.results.map((result) => result.ok)).toEqual([true, false, true]);
    const failed = batch.results[1];
    if (failed && !failed.ok) expect(failed.error.code).toBe("AL_ERR_NOT_FOUND");
    expect(destination.assetIds).toEqual([42, 500]);
  });

  it("fails when every file fails or none are given", async () => {
    const destination = createAssetCollection();

    const allMissing = await importAssetFiles([join(dir, "x.alasset")], destination);
    const empty = await importAssetFiles([], destination);

    expect(allMissing.ok).toBe(false);
    expect(allMissing.failed).toBe(1);
    expect(empty).toEqual({
      ok: false,
      results: [],
      succeeded: 0,
      failed: 0,
      error: { code: "AL_ERR_INVALID_INPUT", message: "No asset files given to import." },
    });
  });
});

describe("listAssetFiles", () => {
  it("lists asset files in path order and ignores everything else", async () => {
    await writeFile(join(dir, "b.alasset"), "");
    await writeFile(join(dir, "a.alasset"), "");
    await writeFile(join(dir, "notes.txt"), "");
    await mkdir(join(dir, "nested.alasset"));

    expect(await listAssetFiles(dir)).toEqual([join(dir, "a.alasset"), join(dir, "b.alasset")]);
  });

  it("returns nothing for a missing directory", async () => {
    expect(await listAssetFiles(join(dir, "absent"))).toEqual([]);
  });
});
