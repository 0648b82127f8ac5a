import { oracleMatches } from './oracle.js';
import {
  concat,
  empty,
  literal,
  noMatch,
  type Pattern,
  repeat,
  union,
} from './pattern.js';

const a = literal('a');
const b = literal('b');

describe('oracleMatches', () => {
  const cases: [string, Pattern, string, boolean][] = [
    ['∅', noMatch(), '', false],
    ['ε', empty(), '', true],
    ['ε', empty(), 'a', false],
    ['a', a, 'a', true],
    ['a', a, 'aa', false],
    ['ab', concat(a, b), 'ab', true],
    ['ab', concat(a, b), 'a', false],
    ['a|b', union(a, b), 'b', true],
    ['(ab)*', repeat(concat(a, b)), 'abab', true],
    ['(ab)*', repeat(concat(a, b)), 'aba', false],
    ['(ε|a)b', concat(union(empty(), a), b), 'b', true],
  ];
  test.each(cases)('%s against %j', (_, pattern, input, expected) => {
    expect(oracleMatches(pattern, [...input])).toBe(expected);
  });

  test('terminates when the repeated pattern is nullable', () => {
    const pattern = repeat(union(empty(), repeat(a)));
    expect(oracleMatches(pattern, [...'aaaa'])).toBe(true);
    expect(oracleMatches(pattern, [...'aab'])).toBe(false);
    expect(oracleMatches(repeat(empty()), [])).toBe(true);
    expect(oracleMatches(repeat(empty()), ['a'])).toBe(false);
  });
});
