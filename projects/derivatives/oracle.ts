import { range } from '../utils/iter.js';
import { type Pattern, PatternKind, type Sym } from './pattern.js';

/**
 * Reference definition of "`pattern` matches `word`", written directly from
 * the meaning of each constructor. It tries every split point and so runs
 * in exponential time; it exists to check the derivative matcher against.
 */
export function oracleMatches(
  pattern: Pattern,
  word: readonly Sym[]
): boolean {
  switch (pattern.kind) {
    case PatternKind.NO_MATCH:
      return false;
    case PatternKind.EMPTY:
      return word.length === 0;
    case PatternKind.LITERAL:
      return word.length === 1 && word[0] === pattern.props.sym;
    case PatternKind.CONCAT: {
      const { left, right } = pattern.props;
      for (const i of range(0, word.length + 1)) {
        if (
          oracleMatches(left, word.slice(0, i)) &&
          oracleMatches(right, word.slice(i))
        ) {
          return true;
        }
      }
      return false;
    }
    case PatternKind.UNION:
      return (
        oracleMatches(pattern.props.left, word) ||
        oracleMatches(pattern.props.right, word)
      );
    case PatternKind.REPEAT: {
      if (word.length === 0) {
        return true;
      }
      // Pieces of length zero add nothing to a partition, so only nonempty
      // first pieces are tried. This keeps the recursion finite when the
      // inner pattern is nullable.
      for (const i of range(1, word.length + 1)) {
        if (
          oracleMatches(pattern.props.inner, word.slice(0, i)) &&
          oracleMatches(pattern, word.slice(i))
        ) {
          return true;
        }
      }
      return false;
    }
  }
}
