// Errors raised while building or validating records.

export type RecordErrorKind =
  | "invalidFid"
  | "duplicateField"
  | "unsortedFields"
  | "invalidValue"
  | "maxDepthExceeded"
  | "maxFieldsExceeded"
  | "maxStringLengthExceeded"
  | "maxArrayLengthExceeded";

export class RecordError extends Error {
  constructor(
    public kind: RecordErrorKind,
    message: string,
    /** Field the error refers to, when there is one. */
    public fid?: number,
  ) {
    super(message);
    this.name = "RecordError";
  }

  static invalidFid(fid: number): RecordError {
    return new RecordError("invalidFid", `invalid field id ${fid}: must be an integer in 0..=65535`, fid);
  }

  static duplicateField(fid: number): RecordError {
    return new RecordError("duplicateField", `duplicate field F${fid}`, fid);
  }

  static unsortedFields(prev: number, fid: number): RecordError {
    return new RecordError("unsortedFields", `field F${fid} follows F${prev}`, fid);
  }

  static invalidValue(reason: string): RecordError {
    return new RecordError("invalidValue", reason);
  }

  static maxDepthExceeded(max: number, seen: number): RecordError {
    return new RecordError("maxDepthExceeded", `maximum nesting depth exceeded (max=${max}, saw=${seen})`);
  }

  static maxFieldsExceeded(max: number, seen: number): RecordError {
    return new RecordError("maxFieldsExceeded", `maximum field count exceeded (max=${max}, saw=${seen})`);
  }

  static maxStringLengthExceeded(fid: number, max: number, seen: number): RecordError {
    return new RecordError(
      "maxStringLengthExceeded",
      `maximum string length exceeded in F${fid} (max=${max}, saw=${seen})`,
      fid,
    );
  }

  static maxArrayLengthExceeded(fid: number, max: number, seen: number): RecordError {
    return new RecordError(
      "maxArrayLengthExceeded",
      `maximum array length exceeded in F${fid} (max=${max}, saw=${seen})`,
      fid,
    );
  }
}
