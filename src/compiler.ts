import { scanTokens } from "./lexer/scan.js";
import { scanErrorToDiagnostic } from "./lexer/errors.js";
import type { Token } from "./lexer/tokens.js";
import type { Diagnostic } from "./errors/diagnostic.js";

export interface TokenizeResult {
  /** Empty whenever `errors` is non-empty. */
  tokens: readonly Token[];
  errors: Diagnostic[];
}

/**
 * Scan a source string and report failures as diagnostics.
 * Used by front ends that render errors with formatDiagnostics.
 */
export function tokenize(source: string, filename: string = "<stdin>"): TokenizeResult {
  const result = scanTokens(source);
  if (!result.ok) {
    return { tokens: [], errors: [scanErrorToDiagnostic(result.error, filename)] };
  }
  return { tokens: result.value, errors: [] };
}
