import { RecordError } from "./errors.ts";
import { LnmpRecord } from "./record.ts";
import {
  valueBool,
  valueFloat,
  valueInt,
  valueNestedArray,
  valueNestedRecord,
  valueString,
  valueStringArray,
} from "./types.ts";
import type { FieldId, LnmpField, LnmpValue } from "./types.ts";

/**
 * Fluent record construction. `build()` returns a record in canonical
 * order and refuses duplicate FIDs.
 *
 * @example
 * ```typescript
 * const record = new RecordBuilder()
 *   .int(12, 14532)
 *   .bool(7, true)
 *   .build();
 * record.fields.map((f) => f.fid); // [7, 12]
 * ```
 */
export class RecordBuilder {
  private readonly pending: LnmpField[] = [];

  add(fid: FieldId, value: LnmpValue): this {
    this.pending.push({ fid, value });
    return this;
  }

  addField(f: LnmpField): this {
    return this.add(f.fid, f.value);
  }

  addFields(fields: Iterable<LnmpField>): this {
    for (const f of fields) this.addField(f);
    return this;
  }

  int(fid: FieldId, value: bigint | number): this {
    return this.add(fid, valueInt(value));
  }

  float(fid: FieldId, value: number): this {
    return this.add(fid, valueFloat(value));
  }

  bool(fid: FieldId, value: boolean): this {
    return this.add(fid, valueBool(value));
  }

  string(fid: FieldId, value: string): this {
    return this.add(fid, valueString(value));
  }

  strings(fid: FieldId, value: string[]): this {
    return this.add(fid, valueStringArray(value));
  }

  /** Nested record, either prebuilt or filled in by a callback. */
  nested(fid: FieldId, record: LnmpRecord | ((b: RecordBuilder) => RecordBuilder)): this {
    const inner = record instanceof LnmpRecord ? record : record(new RecordBuilder()).build();
    return this.add(fid, valueNestedRecord(inner));
  }

  nestedArray(fid: FieldId, records: LnmpRecord[]): this {
    return this.add(fid, valueNestedArray(records));
  }

  build(): LnmpRecord {
    const sorted = [...this.pending].sort((a, b) => a.fid - b.fid);
    for (let i = 1; i < sorted.length; i++) {
      if (sorted[i].fid === sorted[i - 1].fid) throw RecordError.duplicateField(sorted[i].fid);
    }
    return LnmpRecord.fromSortedFields(sorted);
  }
}
