export { tokenize, type TokenizeResult } from "./compiler.js";
export { scanTokens } from "./lexer/scan.js";
export { Scanner } from "./lexer/scanner.js";
export { CharCursor } from "./lexer/cursor.js";
export { PositionTracker, type Position } from "./lexer/position.js";
export { KEYWORDS, classifyWord } from "./lexer/keywords.js";
export {
  TokenKind,
  formatLexeme,
  formatToken,
  isInternal,
  makeToken,
  type FixedKind,
  type InternalKind,
  type KeywordKind,
  type Lexeme,
  type Token,
} from "./lexer/tokens.js";
export {
  scanErrorMessage,
  scanErrorToDiagnostic,
  type ScanError,
  type ScanResult,
  type UnknownCharacter,
  type UnterminatedString,
} from "./lexer/errors.js";
export { error, makeSpan, type Diagnostic, type Severity, type Span } from "./errors/diagnostic.js";
export { formatDiagnostic, formatDiagnostics } from "./errors/reporter.js";
