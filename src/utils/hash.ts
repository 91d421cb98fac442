import { createHash } from "crypto";

export function shortDigest(content: string, length = 32): string {
  return createHash("sha256").update(content).digest("hex").slice(0, length);
}
