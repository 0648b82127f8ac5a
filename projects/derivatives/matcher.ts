import { log } from '../utils/debug.js';
import {
  exactBuilder,
  type PatternBuilder,
  simplifyingBuilder,
} from './builder.js';
import { derive } from './derive.js';
import { nullable } from './nullable.js';
import {
  type Pattern,
  PatternKind,
  PatternTable,
  type Sym,
} from './pattern.js';

export type MatcherOptions = {
  /**
   * Canonicalize each derivative as it is built so the pattern stays small.
   * Turning this off gives the bare derivative equations, which grow with
   * every symbol; that mode is for checking the engine on short inputs.
   */
  simplify: boolean;
  /**
   * Where derivatives are interned. Each matcher makes a fresh table unless
   * given one, so its derivatives are released along with it.
   */
  table: PatternTable;
  /** Log every step through the debug logger. */
  trace: boolean;
};

const DEFAULT_OPTIONS = {
  simplify: true,
  trace: false,
};

function withDefaults(options: Partial<MatcherOptions>): MatcherOptions {
  return { ...DEFAULT_OPTIONS, table: new PatternTable(), ...options };
}

export function builderFor(options: Partial<MatcherOptions> = {}) {
  const { simplify, table } = withDefaults(options);
  return simplify ? simplifyingBuilder(table) : exactBuilder(table);
}

/**
 * Matches a pattern against input fed one symbol at a time. The only state
 * is the current derivative, so a matcher can be inspected after any prefix.
 */
export class Matcher {
  readonly pattern: Pattern;
  private options: MatcherOptions;
  private builder: PatternBuilder;
  private _current: Pattern;
  private _consumed: number = 0;

  constructor(pattern: Pattern, options: Partial<MatcherOptions> = {}) {
    this.pattern = pattern;
    this.options = withDefaults(options);
    this.builder = builderFor(this.options);
    this._current = pattern;
  }

  get current(): Pattern {
    return this._current;
  }

  get consumed(): number {
    return this._consumed;
  }

  feed(sym: Sym): this {
    this._current = derive(sym, this._current, this.builder);
    this._consumed++;
    if (this.options.trace) {
      log(
        `${this._consumed}: ${JSON.stringify(sym)} ->`,
        this._current.toString()
      );
    }
    return this;
  }

  /**
   * Feed symbols until the input runs out or nothing can match any more.
   */
  feedAll(symbols: Iterable<Sym>): this {
    for (const sym of symbols) {
      if (this.isDead()) {
        break;
      }
      this.feed(sym);
    }
    return this;
  }

  /**
   * Whether the input fed so far is matched.
   */
  accepts(): boolean {
    return nullable(this._current);
  }

  /**
   * True once no continuation of the input can be matched.
   */
  isDead(): boolean {
    return this._current.kind === PatternKind.NO_MATCH;
  }

  reset(): this {
    this._current = this.pattern;
    this._consumed = 0;
    return this;
  }
}

/**
 * Whether `pattern` matches the whole of `input`.
 */
export function matches(
  pattern: Pattern,
  input: Iterable<Sym>,
  options: Partial<MatcherOptions> = {}
): boolean {
  return new Matcher(pattern, options).feedAll(input).accepts();
}
