import { type PatternBuilder, exactBuilder } from './builder.js';
import { nullable } from './nullable.js';
import { type Pattern, PatternKind, type Sym } from './pattern.js';

const exact = exactBuilder();

/**
 * The derivative of `pattern` with respect to `sym`: the pattern matching
 * every `s` such that `pattern` matches `sym` followed by `s`.
 */
export function derive(
  sym: Sym,
  pattern: Pattern,
  builder: PatternBuilder = exact
): Pattern {
  switch (pattern.kind) {
    case PatternKind.NO_MATCH:
    case PatternKind.EMPTY:
      return builder.noMatch();
    case PatternKind.LITERAL:
      return pattern.props.sym === sym ? builder.empty() : builder.noMatch();
    case PatternKind.UNION:
      return builder.union(
        derive(sym, pattern.props.left, builder),
        derive(sym, pattern.props.right, builder)
      );
    case PatternKind.REPEAT:
      return builder.concat(
        derive(sym, pattern.props.inner, builder),
        pattern
      );
    case PatternKind.CONCAT: {
      const { left, right } = pattern.props;
      const consumedByLeft = builder.concat(derive(sym, left, builder), right);
      if (!nullable(left)) {
        return consumedByLeft;
      }
      // left can vanish, so the symbol may also start a match of right
      return builder.union(consumedByLeft, derive(sym, right, builder));
    }
  }
}

/**
 * Derive by every symbol of `word` in order.
 */
export function deriveAll(
  word: Iterable<Sym>,
  pattern: Pattern,
  builder: PatternBuilder = exact
): Pattern {
  let current = pattern;
  for (const sym of word) {
    current = derive(sym, current, builder);
  }
  return current;
}
