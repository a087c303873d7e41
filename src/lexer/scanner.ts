import { CharCursor } from "./cursor.js";
import { fail, ok, unknownCharacter, unterminatedString, type ScanResult } from "./errors.js";
import { classifyWord } from "./keywords.js";
import { PositionTracker } from "./position.js";
import { TokenKind, makeToken, type Lexeme, type Token } from "./tokens.js";

export class Scanner {
  private readonly cursor: CharCursor;
  private readonly position = new PositionTracker();
  /** Characters consumed for the token currently being recognized. */
  private current: string = "";

  constructor(source: string) {
    this.cursor = new CharCursor(source);
    this.position.reset();
  }

  /**
   * Consumes exactly one token, including whitespace, comments and EOF.
   * Lookahead that does not match is never committed, so the next call
   * starts at the first character of the following token.
   */
  scanToken(): ScanResult<Token> {
    this.current = "";
    const ch = this.advance();
    if (ch === undefined) return this.emit({ kind: TokenKind.EOF });

    switch (ch) {
      case "(": return this.emit({ kind: TokenKind.LeftParen });
      case ")": return this.emit({ kind: TokenKind.RightParen });
      case "{": return this.emit({ kind: TokenKind.LeftBrace });
      case "}": return this.emit({ kind: TokenKind.RightBrace });
      case ";": return this.emit({ kind: TokenKind.SemiColon });
      case ",": return this.emit({ kind: TokenKind.Comma });
      case ".": return this.emit({ kind: TokenKind.Dot });
      case "-": return this.emit({ kind: TokenKind.Minus });
      case "+": return this.emit({ kind: TokenKind.Plus });
      case "*": return this.emit({ kind: TokenKind.Star });
      case "!": return this.emitOperator(TokenKind.Bang, TokenKind.BangEqual);
      case "=": return this.emitOperator(TokenKind.Equal, TokenKind.DoubleEqual);
      case ">": return this.emitOperator(TokenKind.Greater, TokenKind.GreaterEqual);
      case "<": return this.emitOperator(TokenKind.Less, TokenKind.LessEqual);
      case "/":
        if (this.match("/")) {
          this.skipLine();
          return this.emit({ kind: TokenKind.Comment });
        }
        return this.emit({ kind: TokenKind.Slash });
      case '"': return this.readString();
    }

    if (isWhitespace(ch)) return this.emit({ kind: TokenKind.Whitespace });
    if (isDigit(ch)) return this.readNumber();
    if (isAlpha(ch)) return this.readIdentOrKeyword();

    return fail(unknownCharacter(this.position.snapshot(), this.current));
  }

  private emitOperator(
    single: TokenKind.Bang | TokenKind.Equal | TokenKind.Greater | TokenKind.Less,
    withEqual: TokenKind.BangEqual | TokenKind.DoubleEqual | TokenKind.GreaterEqual | TokenKind.LessEqual,
  ): ScanResult<Token> {
    return this.emit({ kind: this.match("=") ? withEqual : single });
  }

  private readString(): ScanResult<Token> {
    const start = this.position.snapshot();
    this.current = ""; // drop the opening quote

    while (this.cursor.peek() !== '"') {
      if (this.cursor.isAtEnd()) {
        return fail(unterminatedString(start, this.current));
      }
      this.advance();
    }

    const body = this.current;
    this.advance(); // closing quote
    return this.emit({ kind: TokenKind.StringLiteral, text: body });
  }

  private readNumber(): ScanResult<Token> {
    let seenDot = false;

    for (;;) {
      const next = this.cursor.peek();
      if (next !== undefined && isDigit(next)) {
        this.advance();
      } else if (next === "." && !seenDot && isDigitChar(this.cursor.peek(1))) {
        seenDot = true;
        this.advance();
      } else {
        break;
      }
    }

    return this.emit({ kind: TokenKind.NumberLiteral, value: Number(this.current) });
  }

  private readIdentOrKeyword(): ScanResult<Token> {
    for (;;) {
      const next = this.cursor.peek();
      if (next === undefined || !(isAlpha(next) || isDigit(next))) break;
      this.advance();
    }

    return this.emit(classifyWord(this.current));
  }

  /** Consumes through the next newline, or to the end of the input. */
  private skipLine(): void {
    while (!this.cursor.isAtEnd()) {
      if (this.advance() === "\n") return;
    }
  }

  private match(expected: string): boolean {
    if (this.cursor.peek() !== expected) return false;
    this.advance();
    return true;
  }

  private advance(): string | undefined {
    const ch = this.cursor.next();
    if (ch === undefined) return undefined;

    this.current += ch;
    if (ch === "\n") {
      this.position.advanceLine();
    } else {
      this.position.advanceColumn();
    }
    return ch;
  }

  private emit(lexeme: Lexeme): ScanResult<Token> {
    return ok(makeToken(lexeme, this.position.snapshot()));
  }
}

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\r" || ch === "\t" || ch === "\n";
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isDigitChar(ch: string | undefined): boolean {
  return ch !== undefined && isDigit(ch);
}

function isAlpha(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
}
