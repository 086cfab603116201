/**
 * @cadence/event-store — Hash chain.
 *
 * Each stored event is hashed as SHA-256 over the RFC 8785 (JCS)
 * canonical JSON of its content, and that content includes the previous
 * event's hash:
 *
 *   hash[n] = sha256(jcs({ position, streamId, version, recordedAt, event, previousHash: hash[n-1] }))
 *   hash[0]'s previousHash = GENESIS_HASH
 *
 * Editing, dropping or reordering any stored event breaks the chain there.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { ChainBreak, HashedContent, IntegrityReport, StoredEvent } from "./types.js";

export const GENESIS_HASH = "0".repeat(64);

/**
 * Hex SHA-256 of the canonical content.
 */
export function hashStoredEvent(content: HashedContent): string {
  const canonical = canonicalize({
    position: content.position,
    streamId: content.streamId,
    version: content.version,
    recordedAt: content.recordedAt,
    event: content.event,
    previousHash: content.previousHash,
  });
  return createHash("sha256").update(canonical).digest("hex");
}

/**
 * Link `content` onto the chain ending at `previousHash`.
 */
export function seal(content: Omit<HashedContent, "previousHash">, previousHash: string): StoredEvent {
  const linked: HashedContent = { ...content, previousHash };
  return { ...linked, hash: hashStoredEvent(linked) };
}

/**
 * Walk `events` (position order, starting at position 1) and report the
 * first place the chain does not hold.
 */
export function verifyChain(events: readonly StoredEvent[]): IntegrityReport {
  let previousHash = GENESIS_HASH;
  let verified = 0;

  for (const stored of events) {
    const firstBreak = checkLink(stored, verified + 1, previousHash);
    if (firstBreak !== undefined) {
      return { valid: false, verified, firstBreak };
    }
    previousHash = stored.hash;
    verified++;
  }

  return { valid: true, verified };
}

function checkLink(
  stored: StoredEvent,
  expectedPosition: number,
  previousHash: string,
): ChainBreak | undefined {
  if (stored.position !== expectedPosition) {
    return {
      position: stored.position,
      kind: "sequence",
      expected: String(expectedPosition),
      actual: String(stored.position),
    };
  }
  if (stored.previousHash !== previousHash) {
    return { position: stored.position, kind: "link", expected: previousHash, actual: stored.previousHash };
  }
  const { hash, ...content } = stored;
  const recomputed = hashStoredEvent(content);
  if (hash !== recomputed) {
    return { position: stored.position, kind: "hash", expected: recomputed, actual: hash };
  }
  return undefined;
}
