import {
  defaultTable,
  type Pattern,
  PatternKind,
  type PatternTable,
  type Sym,
} from './pattern.js';

/**
 * The constructors the derivative engine builds its results with.
 */
export interface PatternBuilder {
  noMatch(): Pattern;
  empty(): Pattern;
  literal(sym: Sym): Pattern;
  concat(left: Pattern, right: Pattern): Pattern;
  union(left: Pattern, right: Pattern): Pattern;
  repeat(inner: Pattern): Pattern;
}

/**
 * Builds exactly the node that was asked for.
 */
export function exactBuilder(
  table: PatternTable = defaultTable
): PatternBuilder {
  return {
    noMatch: () => table.noMatch(),
    empty: () => table.empty(),
    literal: (sym) => table.literal(sym),
    concat: (left, right) => table.concat(left, right),
    union: (left, right) => table.union(left, right),
    repeat: (inner) => table.repeat(inner),
  };
}

function alternatives(pattern: Pattern, into: Map<number, Pattern>) {
  if (pattern.kind === PatternKind.UNION) {
    alternatives(pattern.props.left, into);
    alternatives(pattern.props.right, into);
  } else if (pattern.kind !== PatternKind.NO_MATCH) {
    into.set(pattern.id, pattern);
  }
}

/**
 * Builds a pattern matching the same language as the requested node, folding
 * away identities, nesting sequences to the right and keeping unions in a
 * canonical form (flattened, deduplicated, ordered by id). With unions
 * canonical, a pattern has only finitely many distinct derivatives.
 */
export function simplifyingBuilder(
  table: PatternTable = defaultTable
): PatternBuilder {
  const exact = exactBuilder(table);
  const concat = (left: Pattern, right: Pattern): Pattern => {
    if (
      left.kind === PatternKind.NO_MATCH ||
      right.kind === PatternKind.NO_MATCH
    ) {
      return table.noMatch();
    }
    if (left.kind === PatternKind.EMPTY) {
      return right;
    }
    if (right.kind === PatternKind.EMPTY) {
      return left;
    }
    if (left.kind === PatternKind.CONCAT) {
      // (xy)z => x(yz): derive then only looks at the head of a sequence
      return concat(left.props.left, concat(left.props.right, right));
    }
    return table.concat(left, right);
  };
  return {
    ...exact,
    concat,
    union(left, right) {
      const alts: Map<number, Pattern> = new Map();
      alternatives(left, alts);
      alternatives(right, alts);
      const sorted = [...alts.values()].sort((a, b) => a.id - b.id);
      if (sorted.length === 0) {
        return table.noMatch();
      }
      return sorted.reduceRight((rest, alt) => table.union(alt, rest));
    },
    repeat(inner) {
      switch (inner.kind) {
        case PatternKind.NO_MATCH:
        case PatternKind.EMPTY:
          return table.empty();
        case PatternKind.REPEAT:
          return inner;
        default:
          return table.repeat(inner);
      }
    },
  };
}
