import { TokenKind, type KeywordKind, type Lexeme } from "./tokens.js";

export const KEYWORDS: ReadonlyMap<string, KeywordKind> = new Map<string, KeywordKind>([
  ["and", TokenKind.And],
  ["class", TokenKind.Class],
  ["else", TokenKind.Else],
  ["false", TokenKind.False],
  ["for", TokenKind.For],
  ["func", TokenKind.Func],
  ["if", TokenKind.If],
  ["let", TokenKind.Let],
  ["nil", TokenKind.Nil],
  ["or", TokenKind.Or],
  ["print", TokenKind.Print],
  ["return", TokenKind.Return],
  ["super", TokenKind.Super],
  ["this", TokenKind.This],
  ["true", TokenKind.True],
  ["while", TokenKind.While],
]);

/** Exact, case-sensitive match against the reserved words; anything else is an identifier. */
export function classifyWord(text: string): Lexeme {
  const keyword = KEYWORDS.get(text);
  if (keyword !== undefined) {
    return { kind: keyword };
  }
  return { kind: TokenKind.Identifier, text };
}
