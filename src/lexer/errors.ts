import { error, makeSpan, type Diagnostic } from "../errors/diagnostic.js";
import type { Position } from "./position.js";

export interface UnknownCharacter {
  kind: "UnknownCharacter";
  /** Position after the offending character was consumed. */
  position: Position;
  text: string;
}

export interface UnterminatedString {
  kind: "UnterminatedString";
  /** Position just after the opening quote. */
  position: Position;
  /** Body consumed before the input ran out. */
  text: string;
}

export type ScanError = UnknownCharacter | UnterminatedString;

export type ScanResult<T> = { ok: true; value: T } | { ok: false; error: ScanError };

export function ok<T>(value: T): ScanResult<T> {
  return { ok: true, value };
}

export function fail<T>(err: ScanError): ScanResult<T> {
  return { ok: false, error: err };
}

export function unknownCharacter(position: Position, text: string): ScanError {
  return { kind: "UnknownCharacter", position, text };
}

export function unterminatedString(position: Position, text: string): ScanError {
  return { kind: "UnterminatedString", position, text };
}

export function scanErrorMessage(err: ScanError): string {
  switch (err.kind) {
    case "UnknownCharacter":
      return `Unknown character '${err.text}' at ${err.position.line}:${err.position.column}`;
    case "UnterminatedString":
      return `Unterminated string literal starting at ${err.position.line}:${err.position.column}`;
  }
}

export function scanErrorToDiagnostic(err: ScanError, filename: string = "<stdin>"): Diagnostic {
  const { line, column } = err.position;
  // Both kinds record the position after a single-column character (the offender or the quote)
  const span = makeSpan(filename, line, column - 1, line, column);
  switch (err.kind) {
    case "UnknownCharacter":
      return error(`Unknown character '${err.text}'`, span);
    case "UnterminatedString":
      return error("Unterminated string literal", span, "Add a closing '\"' before the end of the input");
  }
}
