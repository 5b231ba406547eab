import { createHash } from "node:crypto";

function toStableJsonValue(input: unknown): unknown {
  if (input === null || typeof input !== "object") return input;
  if (Array.isArray(input)) {
    return input.map((item) => toStableJsonValue(item));
  }
  const keys = Object.keys(input).sort((a, b) => a.localeCompare(b));
  const out: Record<string, unknown> = {};
  for (const key of keys) {
    out[key] = toStableJsonValue(Reflect.get(input, key));
  }
  return out;
}

export function stableJsonStringify(input: unknown, indent = 0): string {
  return JSON.stringify(toStableJsonValue(input), null, indent);
}

export function sha256HexFromBytes(input: Uint8Array): string {
  return createHash("sha256").update(input).digest("hex");
}
