import { err, ok, type Result } from 'neverthrow';
import { exactBuilder, type PatternBuilder } from '../derivatives/builder.js';
import type { Pattern } from '../derivatives/pattern.js';
import { collect } from '../utils/iter.js';
import { PatternSyntaxError } from './errors.js';
import { type Lexeme, Lexer, Token } from './lexer.js';

/**
 * Recursive descent parser for pattern text:
 *
 *   union   := concat ('|' concat)*
 *   concat  := postfix*
 *   postfix := atom ('*' | '+' | '?')*
 *   atom    := CHAR | ESCAPE | 'ε' | '∅' | '(' union ')'
 *
 * Sequences and alternatives nest to the right, and `x+` contributes `x` and
 * `x*` to the enclosing sequence. An empty concatenation (empty text, `()`,
 * or a blank side of `|`) is the empty-string pattern.
 */
export class RegexParser {
  private tokens: Lexeme[];
  private index = 0;
  private builder: PatternBuilder;

  private constructor(input: string, builder: PatternBuilder) {
    this.tokens = collect(new Lexer(input));
    this.builder = builder;
  }

  static parseOrThrow(
    input: string,
    builder: PatternBuilder = exactBuilder()
  ): Pattern {
    return new RegexParser(input, builder).parse();
  }

  static parseResult(
    input: string,
    builder: PatternBuilder = exactBuilder()
  ): Result<Pattern, PatternSyntaxError> {
    try {
      return ok(RegexParser.parseOrThrow(input, builder));
    } catch (e) {
      if (e instanceof PatternSyntaxError) {
        return err(e);
      }
      throw e;
    }
  }

  static parse(
    input: string,
    builder: PatternBuilder = exactBuilder()
  ): Pattern | null {
    return RegexParser.parseResult(input, builder).unwrapOr(null);
  }

  parse(): Pattern {
    const pattern = this.parseUnion();
    const extra = this.peek();
    if (extra) {
      // parseUnion only stops early on a ) it has no ( for
      throw new PatternSyntaxError(extra.span, 'Unmatched )');
    }
    return pattern;
  }

  private peek(): Lexeme | undefined {
    return this.tokens[this.index];
  }

  private advance(): Lexeme | undefined {
    return this.tokens[this.index++];
  }

  private sequence(factors: Pattern[]): Pattern {
    if (factors.length === 0) {
      return this.builder.empty();
    }
    return factors.reduceRight((rest, factor) =>
      this.builder.concat(factor, rest)
    );
  }

  private parseUnion(): Pattern {
    const alternatives = [this.parseConcat()];
    while (this.peek()?.token == Token.OR) {
      this.advance();
      alternatives.push(this.parseConcat());
    }
    return alternatives.reduceRight((rest, alternative) =>
      this.builder.union(alternative, rest)
    );
  }

  private parseConcat(): Pattern {
    const factors: Pattern[] = [];
    while (true) {
      const token = this.peek();
      if (
        token == undefined ||
        token.token == Token.OR ||
        token.token == Token.CLOSE_PAREN
      ) {
        break;
      }
      this.advance();
      factors.push(...this.parsePostfix(token));
    }
    return this.sequence(factors);
  }

  private parsePostfix(first: Lexeme): Pattern[] {
    let factors = [this.parseAtom(first)];
    while (true) {
      const token = this.peek();
      if (token?.token == Token.STAR) {
        factors = [this.builder.repeat(this.sequence(factors))];
      } else if (token?.token == Token.PLUS) {
        const node = this.sequence(factors);
        factors = [node, this.builder.repeat(node)];
      } else if (token?.token == Token.OPTIONAL) {
        factors = [
          this.builder.union(this.builder.empty(), this.sequence(factors)),
        ];
      } else {
        return factors;
      }
      this.advance();
    }
  }

  private parseAtom(token: Lexeme): Pattern {
    switch (token.token) {
      case Token.CHAR:
        return this.builder.literal(token.substr);
      case Token.ESCAPE:
        if (token.substr.length < 2) {
          throw new PatternSyntaxError(
            token.span,
            'Expected a character to follow \\'
          );
        }
        return this.builder.literal(token.substr.slice(1));
      case Token.EMPTY:
        return this.builder.empty();
      case Token.NO_MATCH:
        return this.builder.noMatch();
      case Token.OPEN_PAREN: {
        const child = this.parseUnion();
        const close = this.advance();
        if (close?.token != Token.CLOSE_PAREN) {
          throw new PatternSyntaxError(
            token.span,
            'Reached end of input before finding matching )'
          );
        }
        return child;
      }
      case Token.STAR:
      case Token.PLUS:
      case Token.OPTIONAL:
        throw new PatternSyntaxError(
          token.span,
          `Expected ${token.substr} operator to follow another expression`
        );
      case Token.OR:
      case Token.CLOSE_PAREN:
        throw new PatternSyntaxError(
          token.span,
          `Unexpected ${token.substr}`
        );
    }
  }
}

export const parsePattern = RegexParser.parseOrThrow;
