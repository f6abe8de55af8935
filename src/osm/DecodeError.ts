export type DecodeErrorKind =
  | "MalformedDocument"
  | "UnknownElementKind"
  | "UnknownActionKind"
  | "MalformedElement";

export class DecodeError extends Error {
  readonly kind: DecodeErrorKind;

  constructor(kind: DecodeErrorKind, message: string) {
    super(`${kind}: ${message}`);
    this.name = "DecodeError";
    this.kind = kind;
  }
}
