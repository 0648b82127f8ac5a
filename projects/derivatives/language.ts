import { derive } from './derive.js';
import { builderFor, type MatcherOptions } from './matcher.js';
import { nullable } from './nullable.js';
import { type Pattern, PatternKind, type Sym } from './pattern.js';

/**
 * The distinct literal symbols appearing in a pattern, sorted.
 */
export function alphabet(pattern: Pattern): Sym[] {
  const syms: Set<Sym> = new Set();
  const visit = (p: Pattern) => {
    switch (p.kind) {
      case PatternKind.LITERAL:
        syms.add(p.props.sym);
        break;
      case PatternKind.CONCAT:
      case PatternKind.UNION:
        visit(p.props.left);
        visit(p.props.right);
        break;
      case PatternKind.REPEAT:
        visit(p.props.inner);
        break;
    }
  };
  visit(pattern);
  return [...syms].sort();
}

/**
 * Yields every word of at most `maxLength` symbols that the pattern matches,
 * shortest first and in alphabet order within a length. Only symbols of the
 * pattern's own alphabet can appear in a matched word.
 */
export function* words(
  pattern: Pattern,
  maxLength: number,
  options: Partial<MatcherOptions> = {}
): Generator<Sym[], void> {
  const builder = builderFor(options);
  const syms = alphabet(pattern);
  let frontier: { word: Sym[]; pattern: Pattern }[] = [{ word: [], pattern }];
  for (let length = 0; length <= maxLength && frontier.length > 0; length++) {
    const next: typeof frontier = [];
    for (const entry of frontier) {
      if (nullable(entry.pattern)) {
        yield entry.word;
      }
      if (length === maxLength) {
        continue;
      }
      for (const sym of syms) {
        const d = derive(sym, entry.pattern, builder);
        if (d.kind !== PatternKind.NO_MATCH) {
          next.push({ word: [...entry.word, sym], pattern: d });
        }
      }
    }
    frontier = next;
  }
}
