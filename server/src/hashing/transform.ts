import { createHash } from "crypto";

/**
 * SHA-256 of `data`, as padded standard base64 (44 characters).
 */
export function transform(data: Uint8Array): string {
  return createHash("sha256").update(data).digest("base64");
}
