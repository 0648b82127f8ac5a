import { EMPTY_CHAR, NO_MATCH_CHAR } from '../derivatives/pattern.js';
import { type CodePoint, codePoints } from '../utils/iter.js';

export enum Token {
  PLUS = 'PLUS',
  STAR = 'STAR',
  OPTIONAL = 'OPTIONAL',
  OR = 'OR',
  OPEN_PAREN = 'OPEN_PAREN',
  CLOSE_PAREN = 'CLOSE_PAREN',
  ESCAPE = 'ESCAPE',
  EMPTY = 'EMPTY',
  NO_MATCH = 'NO_MATCH',
  CHAR = 'CHAR',
}

/** Offsets into the pattern text, in utf-16 code units. */
export type Span = { readonly from: number; readonly to: number };

export type Lexeme = {
  readonly token: Token;
  readonly span: Span;
  /** The text the token was read from, backslash included for escapes. */
  readonly substr: string;
};

const operators: Map<string, Token> = new Map([
  ['+', Token.PLUS],
  ['*', Token.STAR],
  ['?', Token.OPTIONAL],
  ['|', Token.OR],
  ['(', Token.OPEN_PAREN],
  [')', Token.CLOSE_PAREN],
  [EMPTY_CHAR, Token.EMPTY],
  [NO_MATCH_CHAR, Token.NO_MATCH],
]);

/**
 * Splits pattern text into tokens, one per code point except for escapes,
 * which take the backslash and the character after it. A backslash at the
 * very end of the input comes out as an ESCAPE token on its own.
 */
export class Lexer implements Iterator<Lexeme> {
  private chars: Iterator<CodePoint>;

  constructor(input: string) {
    this.chars = codePoints(input);
  }

  next(): IteratorResult<Lexeme> {
    const next = this.chars.next();
    if (next.done) {
      return { done: true, value: undefined };
    }
    const { char, from, to } = next.value;
    if (char === '\\') {
      const escaped = this.chars.next();
      if (escaped.done) {
        return {
          done: false,
          value: { token: Token.ESCAPE, span: { from, to }, substr: char },
        };
      }
      return {
        done: false,
        value: {
          token: Token.ESCAPE,
          span: { from, to: escaped.value.to },
          substr: char + escaped.value.char,
        },
      };
    }
    const token = operators.get(char) ?? Token.CHAR;
    return {
      done: false,
      value: { token, span: { from, to }, substr: char },
    };
  }

  [Symbol.iterator]() {
    return this;
  }
}
