import { fail, ok, type ScanResult } from "./errors.js";
import { Scanner } from "./scanner.js";
import { TokenKind, isInternal, type Token } from "./tokens.js";

/**
 * Scans a whole source text. Whitespace and comments are dropped and EOF
 * ends the pass without appearing in the result. The first error aborts
 * the scan; no partial token list is returned.
 */
export function scanTokens(source: string): ScanResult<readonly Token[]> {
  const scanner = new Scanner(source);
  const tokens: Token[] = [];

  for (;;) {
    const result = scanner.scanToken();
    if (!result.ok) return fail(result.error);

    const token = result.value;
    if (token.lexeme.kind === TokenKind.EOF) break;
    if (!isInternal(token.lexeme)) tokens.push(token);
  }

  return ok(Object.freeze(tokens));
}
