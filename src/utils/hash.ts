/**
 * Content hashing
 *
 * SHA-256 over the UTF-8 bytes of a string. The digest is the idempotency
 * token for story element content, so it must not depend on the process,
 * platform or runtime version.
 */

import * as crypto from "node:crypto";

/**
 * Lowercase hex SHA-256 of a string's UTF-8 encoding.
 */
export function calculateContentHash(content: string): string {
  return crypto.createHash("sha256").update(content, "utf8").digest("hex");
}
