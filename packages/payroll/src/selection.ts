/**
 * @cadence/payroll — Selection token codec.
 *
 * The scan phase hands the keeper an opaque token; the keeper hands it
 * back to settlement. Anyone can forge one, so decoding only checks shape:
 * each entry is re-validated against live state during settlement.
 *
 * Wire format: base64url of the RFC 8785 canonical JSON
 *   {"recipients":["0x…", …],"version":1}
 */

import { canonicalize } from "json-canonicalize";
import { z } from "zod";
import type { Address } from "@cadence/types";
import { InvalidSelectionError } from "./errors.js";

export type SelectionToken = string;

export const SELECTION_VERSION = 1;

const SelectionSchema = z.object({
  version: z.literal(SELECTION_VERSION),
  recipients: z.array(z.string()),
});

export function encodeSelection(recipients: readonly Address[]): SelectionToken {
  const json = canonicalize({ version: SELECTION_VERSION, recipients: [...recipients] });
  return Buffer.from(json, "utf8").toString("base64url");
}

/**
 * Decode a token into its raw candidate strings.
 *
 * Entries are returned as-is (not normalised or deduplicated).
 *
 * @throws InvalidSelectionError if the token is not a well-formed selection
 */
export function decodeSelection(token: SelectionToken): readonly string[] {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(token, "base64url").toString("utf8"));
  } catch (err) {
    throw new InvalidSelectionError("Selection token is not valid base64url JSON", {
      cause: err,
    });
  }

  const parsed = SelectionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidSelectionError(
      `Selection token has the wrong shape: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
      { cause: parsed.error },
    );
  }
  return parsed.data.recipients;
}
