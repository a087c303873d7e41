import type { Position } from "./position.js";

export enum TokenKind {
  // Punctuation
  LeftParen = "(",
  RightParen = ")",
  LeftBrace = "{",
  RightBrace = "}",
  Comma = ",",
  Dot = ".",
  Minus = "-",
  Plus = "+",
  SemiColon = ";",
  Slash = "/",
  Star = "*",

  // Operators
  Bang = "!",
  BangEqual = "!=",
  Equal = "=",
  DoubleEqual = "==",
  Greater = ">",
  GreaterEqual = ">=",
  Less = "<",
  LessEqual = "<=",

  // Literals
  Identifier = "Identifier",
  StringLiteral = "StringLiteral",
  NumberLiteral = "NumberLiteral",

  // Keywords
  And = "and",
  Class = "class",
  Else = "else",
  False = "false",
  For = "for",
  Func = "func",
  If = "if",
  Let = "let",
  Nil = "nil",
  Or = "or",
  Print = "print",
  Return = "return",
  Super = "super",
  This = "this",
  True = "true",
  While = "while",

  // Internal: produced by the scanner, never returned from scanTokens
  Comment = "Comment",
  Whitespace = "Whitespace",
  EOF = "EOF",
}

export type KeywordKind =
  | TokenKind.And
  | TokenKind.Class
  | TokenKind.Else
  | TokenKind.False
  | TokenKind.For
  | TokenKind.Func
  | TokenKind.If
  | TokenKind.Let
  | TokenKind.Nil
  | TokenKind.Or
  | TokenKind.Print
  | TokenKind.Return
  | TokenKind.Super
  | TokenKind.This
  | TokenKind.True
  | TokenKind.While;

export type InternalKind = TokenKind.Comment | TokenKind.Whitespace | TokenKind.EOF;

type PayloadKind = TokenKind.Identifier | TokenKind.StringLiteral | TokenKind.NumberLiteral;

/** Every kind whose lexeme carries no payload. */
export type FixedKind = Exclude<TokenKind, PayloadKind>;

export type Lexeme =
  | { kind: FixedKind }
  | { kind: TokenKind.Identifier; text: string }
  | { kind: TokenKind.StringLiteral; text: string }
  | { kind: TokenKind.NumberLiteral; value: number };

export interface Token {
  readonly lexeme: Lexeme;
  readonly position: Position;
}

export function makeToken(lexeme: Lexeme, position: Position): Token {
  return Object.freeze({ lexeme: Object.freeze(lexeme), position });
}

export function isInternal(lexeme: Lexeme): lexeme is { kind: InternalKind } {
  switch (lexeme.kind) {
    case TokenKind.Comment:
    case TokenKind.Whitespace:
    case TokenKind.EOF:
      return true;
    default:
      return false;
  }
}

/** Debug rendering, e.g. `Identifier("x")`, `NumberLiteral(12.5)`, `Let`. */
export function formatLexeme(lexeme: Lexeme): string {
  switch (lexeme.kind) {
    case TokenKind.Identifier:
      return `Identifier(${JSON.stringify(lexeme.text)})`;
    case TokenKind.StringLiteral:
      return `StringLiteral(${JSON.stringify(lexeme.text)})`;
    case TokenKind.NumberLiteral:
      return `NumberLiteral(${lexeme.value})`;
    default:
      return kindName(lexeme.kind);
  }
}

export function formatToken(token: Token): string {
  return `${formatLexeme(token.lexeme)} @ ${token.position.line}:${token.position.column}`;
}

function kindName(kind: FixedKind): string {
  switch (kind) {
    case TokenKind.LeftParen: return "LeftParen";
    case TokenKind.RightParen: return "RightParen";
    case TokenKind.LeftBrace: return "LeftBrace";
    case TokenKind.RightBrace: return "RightBrace";
    case TokenKind.Comma: return "Comma";
    case TokenKind.Dot: return "Dot";
    case TokenKind.Minus: return "Minus";
    case TokenKind.Plus: return "Plus";
    case TokenKind.SemiColon: return "SemiColon";
    case TokenKind.Slash: return "Slash";
    case TokenKind.Star: return "Star";
    case TokenKind.Bang: return "Bang";
    case TokenKind.BangEqual: return "BangEqual";
    case TokenKind.Equal: return "Equal";
    case TokenKind.DoubleEqual: return "DoubleEqual";
    case TokenKind.Greater: return "Greater";
    case TokenKind.GreaterEqual: return "GreaterEqual";
    case TokenKind.Less: return "Less";
    case TokenKind.LessEqual: return "LessEqual";
    case TokenKind.And: return "And";
    case TokenKind.Class: return "Class";
    case TokenKind.Else: return "Else";
    case TokenKind.False: return "False";
    case TokenKind.For: return "For";
    case TokenKind.Func: return "Func";
    case TokenKind.If: return "If";
    case TokenKind.Let: return "Let";
    case TokenKind.Nil: return "Nil";
    case TokenKind.Or: return "Or";
    case TokenKind.Print: return "Print";
    case TokenKind.Return: return "Return";
    case TokenKind.Super: return "Super";
    case TokenKind.This: return "This";
    case TokenKind.True: return "True";
    case TokenKind.While: return "While";
    case TokenKind.Comment: return "Comment";
    case TokenKind.Whitespace: return "Whitespace";
    case TokenKind.EOF: return "EOF";
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}
