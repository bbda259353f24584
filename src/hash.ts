import { createHash } from "node:crypto";

const HASH_PREFIX = "sha256:";

/** `sha256:` + 64 lowercase hex chars. Document identity is this hash of the parsed text. */
export function computeHash(content: string | Buffer): string {
  return HASH_PREFIX + createHash("sha256").update(content).digest("hex");
}
