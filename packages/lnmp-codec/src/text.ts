// Bridge to the human-readable text form. The grammar lives elsewhere;
// this module only fixes the call contract.

import type { LnmpRecord } from "@lnmp/core";
import { BinaryError } from "./error.ts";

export interface RecordTextParser {
  parse(text: string): LnmpRecord;
}

export interface RecordTextEncoder {
  encode(record: LnmpRecord): string;
}

function asTextError(e: unknown): unknown {
  if (e instanceof BinaryError) return e;
  return BinaryError.textFormat(e instanceof Error ? e.message : String(e));
}

export function parseText(text: string, parser: RecordTextParser): LnmpRecord {
  try {
    return parser.parse(text);
  } catch (e) {
    throw asTextError(e);
  }
}

export function renderText(record: LnmpRecord, encoder: RecordTextEncoder): string {
  try {
    return encoder.encode(record);
  } catch (e) {
    throw asTextError(e);
  }
}
