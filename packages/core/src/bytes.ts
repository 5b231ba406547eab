import { AssetliftError } from "./errors.js";
import type { TextureConfig } from "./types.js";

export const TEXTURE_CONFIG_BYTES = 24;
const TEXTURE_CONFIG_MIN_BYTES = 16;

function checkElementSize(bytes: Uint8Array, elementSize: number, label: string): void {
  if (bytes.byteLength % elementSize !== 0) {
    throw new AssetliftError(
      "AL_ERR_FORMAT",
      `${label} byte length ${bytes.byteLength} is not a multiple of ${elementSize}.`,
    );
  }
}

function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export function float32ToBytes(values: Float32Array): Uint8Array {
  const out = new Uint8Array(values.length * 4);
  const view = viewOf(out);
  values.forEach((value, index) => view.setFloat32(index * 4, value, true));
  return out;
}

export function bytesToFloat32(bytes: Uint8Array, label = "float32 buffer"): Float32Array {
  checkElementSize(bytes, 4, label);
  const view = viewOf(bytes);
  const out = new Float32Array(bytes.byteLength / 4);
  for (let i = 0; i < out.length; i += 1) {
    out[i] = view.getFloat32(i * 4, true);
  }
  return out;
}

export function uint16ToBytes(values: Uint16Array): Uint8Array {
  const out = new Uint8Array(values.length * 2);
  const view = viewOf(out);
  values.forEach((value, index) => view.setUint16(index * 2, value, true));
  return out;
}

export function bytesToUint16(bytes: Uint8Array, label = "uint16 buffer"): Uint16Array {
  checkElementSize(bytes, 2, label);
  const view = viewOf(bytes);
  const out = new Uint16Array(bytes.byteLength / 2);
  for (let i = 0; i < out.length; i += 1) {
    out[i] = view.getUint16(i * 2, true);
  }
  return out;
}

export function uint32ToBytes(values: Uint32Array): Uint8Array {
  const out = new Uint8Array(values.length * 4);
  const view = viewOf(out);
  values.forEach((value, index) => view.setUint32(index * 4, value, true));
  return out;
}

export function bytesToUint32(bytes: Uint8Array, label = "uint32 buffer"): Uint32Array {
  checkElementSize(bytes, 4, label);
  const view = viewOf(bytes);
  const out = new Uint32Array(bytes.byteLength / 4);
  for (let i = 0; i < out.length; i += 1) {
    out[i] = view.getUint32(i * 4, true);
  }
  return out;
}

export function packTextureConfig(config: TextureConfig): Uint8Array {
  const out = new Uint8Array(TEXTURE_CONFIG_BYTES);
  const view = viewOf(out);
  view.setInt32(0, config.textureId, true);
  view.setInt32(4, config.start, true);
  view.setInt32(8, config.size, true);
  view.setInt32(12, config.mode, true);
  view.setInt32(16, config.wrapS, true);
  view.setInt32(20, config.wrapT, true);
  return out;
}

/**
 * Wrap modes were appended to the config layout later; blocks that stop after
 * the mode field decode with both wrap modes set to 0.
 */
export function unpackTextureConfig(bytes: Uint8Array): TextureConfig {
  if (bytes.byteLength < TEXTURE_CONFIG_MIN_BYTES) {
    throw new AssetliftError(
      "AL_ERR_FORMAT",
      `Texture config block is ${bytes.byteLength} bytes; at least ${TEXTURE_CONFIG_MIN_BYTES} are required.`,
    );
  }
  const view = viewOf(bytes);
  const hasWrap = bytes.byteLength >= TEXTURE_CONFIG_BYTES;
  return {
    textureId: view.getInt32(0, true),
    start: view.getInt32(4, true),
    size: view.getInt32(8, true),
    mode: view.getInt32(12, true),
    wrapS: hasWrap ? view.getInt32(16, true) : 0,
    wrapT: hasWrap ? view.getInt32(20, true) : 0,
  };
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) return false;
  for (let i = 0; i < a.byteLength; i += 1) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function bytesToBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
}

export function base64ToBytes(input: string): Uint8Array {
  const buffer = Buffer.from(input, "base64");
  return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength).slice();
}
