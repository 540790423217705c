// LNMP record container.

import { RecordError } from "./errors.ts";
import { isValidFid } from "./types.ts";
import type { FieldId, LnmpField, LnmpValue } from "./types.ts";

/**
 * An ordered list of fields.
 *
 * Insertion order is kept as given; the encoder sorts into canonical
 * (ascending FID) order. `addField` does not check for duplicates, so a
 * record can be built that the encoder will refuse. Use `setField` or
 * `RecordBuilder` for replace-or-insert semantics.
 */
export class LnmpRecord {
  private readonly entries: LnmpField[] = [];

  constructor(fields: Iterable<LnmpField> = []) {
    for (const f of fields) this.addField(f);
  }

  static fromFields(fields: Iterable<LnmpField>): LnmpRecord {
    return new LnmpRecord(fields);
  }

  /**
   * Build from fields that are already in canonical order. Throws if
   * they are not strictly ascending.
   */
  static fromSortedFields(fields: readonly LnmpField[]): LnmpRecord {
    for (let i = 1; i < fields.length; i++) {
      const prev = fields[i - 1].fid;
      const fid = fields[i].fid;
      if (fid === prev) throw RecordError.duplicateField(fid);
      if (fid < prev) throw RecordError.unsortedFields(prev, fid);
    }
    return new LnmpRecord(fields);
  }

  get size(): number {
    return this.entries.length;
  }

  get fields(): readonly LnmpField[] {
    return this.entries;
  }

  addField(f: LnmpField): void {
    if (!isValidFid(f.fid)) throw RecordError.invalidFid(f.fid);
    this.entries.push({ fid: f.fid, value: f.value });
  }

  /** Replace the first field with this FID, or append one. */
  setField(fid: FieldId, value: LnmpValue): void {
    if (!isValidFid(fid)) throw RecordError.invalidFid(fid);
    const existing = this.entries.findIndex((f) => f.fid === fid);
    if (existing >= 0) {
      this.entries[existing] = { fid, value };
    } else {
      this.entries.push({ fid, value });
    }
  }

  getField(fid: FieldId): LnmpField | undefined {
    return this.entries.find((f) => f.fid === fid);
  }

  get(fid: FieldId): LnmpValue | undefined {
    return this.getField(fid)?.value;
  }

  hasField(fid: FieldId): boolean {
    return this.entries.some((f) => f.fid === fid);
  }

  /** Remove every field with this FID. Returns whether anything was removed. */
  removeField(fid: FieldId): boolean {
    const before = this.entries.length;
    for (let i = this.entries.length - 1; i >= 0; i--) {
      if (this.entries[i].fid === fid) this.entries.splice(i, 1);
    }
    return this.entries.length !== before;
  }

  /** Fields in ascending FID order. Equal FIDs keep their insertion order. */
  sortedFields(): LnmpField[] {
    // Array.prototype.sort is stable.
    return [...this.entries].sort((a, b) => a.fid - b.fid);
  }

  /** First FID that occurs more than once, if any. */
  duplicateFid(): FieldId | undefined {
    const seen = new Set<FieldId>();
    for (const f of this.entries) {
      if (seen.has(f.fid)) return f.fid;
      seen.add(f.fid);
    }
    return undefined;
  }

  /**
   * Strictly ascending FIDs at this level and, recursively, in every
   * nested record.
   */
  isCanonical(): boolean {
    for (let i = 0; i < this.entries.length; i++) {
      if (i > 0 && this.entries[i].fid <= this.entries[i - 1].fid) return false;
      const v = this.entries[i].value;
      if (v.tag === "NestedRecord" && !v.value.isCanonical()) return false;
      if (v.tag === "NestedArray" && !v.value.every((r) => r.isCanonical())) return false;
    }
    return true;
  }

  [Symbol.iterator](): Iterator<LnmpField> {
    return this.entries[Symbol.iterator]();
  }
}
