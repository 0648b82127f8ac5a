import { alphabet, words } from '../derivatives/language.js';
import { Matcher, matches } from '../derivatives/matcher.js';
import { nullable } from '../derivatives/nullable.js';
import { type Pattern, patternSize } from '../derivatives/pattern.js';
import type { PatternSyntaxError } from '../regex-compiler/errors.js';
import { RegexParser } from '../regex-compiler/parser.js';
import { colors, logger } from '../utils/debug.js';

export type CommandResult = { lines: string[]; exitCode: number };

export type CommandOptions = {
  simplify: boolean;
  verbose: boolean;
};

const DEFAULT_OPTIONS: CommandOptions = { simplify: true, verbose: false };

/**
 * Parse the pattern text, or produce the formatted syntax error as the
 * command's output.
 */
function withPattern(
  source: string,
  run: (pattern: Pattern) => CommandResult
): CommandResult {
  return RegexParser.parseResult(source).match(
    run,
    (e: PatternSyntaxError): CommandResult => ({
      lines: [colors.red(e.format(source))],
      exitCode: 1,
    })
  );
}

export function runMatch(
  source: string,
  inputs: string[],
  options: Partial<CommandOptions> = {}
): CommandResult {
  const { simplify, verbose } = { ...DEFAULT_OPTIONS, ...options };
  return withPattern(source, (pattern) => {
    const lines: string[] = [];
    let exitCode = 0;
    for (const input of inputs) {
      const trace: string[] = [];
      const matched = logger.capture(
        () => matches(pattern, input, { simplify, trace: verbose }),
        trace
      );
      lines.push(...trace.map((line) => colors.cyan(`  ${line}`)));
      if (matched) {
        lines.push(`${colors.green('✓')} ${JSON.stringify(input)}`);
      } else {
        lines.push(`${colors.red('✗')} ${JSON.stringify(input)}`);
        exitCode = 1;
      }
    }
    return { lines, exitCode };
  });
}

export function runTrace(
  source: string,
  input: string,
  options: Partial<CommandOptions> = {}
): CommandResult {
  const { simplify } = { ...DEFAULT_OPTIONS, ...options };
  return withPattern(source, (pattern) => {
    const matcher = new Matcher(pattern, { simplify });
    const lines = [`0: ${pattern}`];
    for (const sym of input) {
      matcher.feed(sym);
      lines.push(
        `${matcher.consumed}: ${JSON.stringify(sym)} -> ${matcher.current}`
      );
    }
    const accepted = matcher.accepts();
    lines.push(accepted ? colors.green('accepted') : colors.red('rejected'));
    return { lines, exitCode: accepted ? 0 : 1 };
  });
}

export function runWords(
  source: string,
  maxLength: number,
  options: Partial<CommandOptions> = {}
): CommandResult {
  const { simplify } = { ...DEFAULT_OPTIONS, ...options };
  return withPattern(source, (pattern) => {
    const lines: string[] = [];
    for (const word of words(pattern, maxLength, { simplify })) {
      lines.push(JSON.stringify(word.join('')));
    }
    return { lines, exitCode: 0 };
  });
}

export function runShow(source: string): CommandResult {
  return withPattern(source, (pattern) => ({
    lines: [
      pattern.toString(),
      JSON.stringify(pattern.toJSON()),
      `nullable: ${nullable(pattern)}`,
      `size: ${patternSize(pattern)}`,
      `alphabet: ${alphabet(pattern).join(' ')}`,
    ],
    exitCode: 0,
  }));
}
