import crypto from "node:crypto";

/** Stable hex seed for one maze; the same inputs always carve the same maze. */
export function deriveSeed(salt: string, mazeId: string, width: number, height: number) {
  const s = `${salt}|${mazeId}|${width}x${height}`;
  return crypto.createHash("sha256").update(s).digest("hex");
}

export function hashLayout(bytes: Uint8Array) {
  return crypto.createHash("sha256").update(bytes).digest("hex");
}
