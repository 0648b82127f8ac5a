import type { Span } from './lexer.js';

const atSource = (source: string, span: Span): string[] => {
  const lines = source.split('\n');
  let lineStart = 0;
  let line = 0;
  while (
    line < lines.length - 1 &&
    lineStart + lines[line].length < span.from
  ) {
    lineStart += lines[line].length + 1;
    line++;
  }
  const prefix = `${line + 1}: `;
  const column = span.from - lineStart;
  return [
    `${prefix}${lines[line]}`,
    '^'.padStart(prefix.length + column + 1, '-'),
  ];
};

export class PatternSyntaxError extends Error {
  readonly span: Span;
  readonly reason: string;

  constructor(span: Span, reason: string) {
    super(`PatternSyntaxError at ${span.from}: ${reason}`);
    this.name = 'PatternSyntaxError';
    this.span = span;
    this.reason = reason;
  }

  /**
   * The message followed by the offending line of `source` with a caret
   * under the error position.
   */
  format(source: string): string {
    return [
      this.message,
      ...atSource(source, this.span).map((line) => '  ' + line),
    ].join('\n');
  }
}
