import type { Position } from "../lexer/position.js";

export interface Span {
  start: Position;
  end: Position;
  source: string;
}

/** Scan failures are the only diagnostics this package produces. */
export type Severity = "error";

export interface Diagnostic {
  severity: Severity;
  message: string;
  span: Span;
  help?: string;
}

export function error(message: string, span: Span, help?: string): Diagnostic {
  return { severity: "error", message, span, help };
}

export function makeSpan(
  source: string,
  startLine: number,
  startCol: number,
  endLine: number,
  endCol: number,
): Span {
  return {
    start: { line: startLine, column: startCol },
    end: { line: endLine, column: endCol },
    source,
  };
}
