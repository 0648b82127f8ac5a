import { matches, type MatcherOptions } from '../derivatives/matcher.js';
import type { Pattern } from '../derivatives/pattern.js';
import { RegexParser } from './parser.js';

export class Regex {
  pattern: string;
  readonly root: Pattern;
  private options: Partial<MatcherOptions>;
  constructor(pattern: string, options: Partial<MatcherOptions> = {}) {
    this.pattern = pattern;
    this.root = RegexParser.parseOrThrow(this.pattern);
    this.options = options;
  }
  /**
   * Whether the whole input is matched.
   */
  test(input: Iterable<string>) {
    return matches(this.root, input, this.options);
  }
  toString() {
    return this.root.toString();
  }
}
