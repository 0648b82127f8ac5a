import { nullable } from './nullable.js';
import {
  concat,
  empty,
  literal,
  noMatch,
  type Pattern,
  repeat,
  union,
} from './pattern.js';

describe('nullable', () => {
  const a = literal('a');
  const cases: [Pattern, boolean][] = [
    [noMatch(), false],
    [empty(), true],
    [a, false],
    [concat(a, empty()), false],
    [concat(empty(), repeat(a)), true],
    [union(a, empty()), true],
    [union(a, noMatch()), false],
    [repeat(a), true],
    [repeat(noMatch()), true],
    [concat(repeat(a), union(noMatch(), repeat(literal('b')))), true],
  ];
  test.each(cases)('%s', (pattern, expected) => {
    expect(nullable(pattern)).toBe(expected);
  });

  test('answers for deep patterns without walking them', () => {
    let sequence: Pattern = empty();
    let choice: Pattern = noMatch();
    for (let i = 0; i < 50000; i++) {
      sequence = concat(repeat(a), sequence);
      choice = union(a, choice);
    }
    expect(nullable(sequence)).toBe(true);
    expect(nullable(choice)).toBe(false);
    expect(nullable(union(choice, sequence))).toBe(true);
  });
});
