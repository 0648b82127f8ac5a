import { derive } from '../derive.js';
import { matches } from '../matcher.js';
import { nullable } from '../nullable.js';
import { oracleMatches } from '../oracle.js';
import {
  concat,
  empty,
  noMatch,
  type Pattern,
  repeat,
  union,
} from '../pattern.js';
import { allWords, randomPatterns } from './test-util.js';

const syms = ['a', 'b'];
const patterns = randomPatterns(20240611, 150, 4);
const shortWords = allWords(syms, 5);

const label = (pattern: Pattern) => pattern.toString();

describe('matches agrees with the oracle', () => {
  test.each(patterns.map((p) => [label(p), p] as const))(
    '%s',
    (_, pattern) => {
      for (const word of shortWords) {
        const expected = oracleMatches(pattern, word);
        expect([word.join(''), matches(pattern, word)]).toEqual([
          word.join(''),
          expected,
        ]);
        expect([
          word.join(''),
          matches(pattern, word, { simplify: false }),
        ]).toEqual([word.join(''), expected]);
      }
    }
  );
});

describe('derive', () => {
  const words = allWords(syms, 4);
  test.each(patterns.slice(0, 60).map((p) => [label(p), p] as const))(
    'matches the remainders of %s',
    (_, pattern) => {
      for (const sym of syms) {
        const d = derive(sym, pattern);
        for (const word of words) {
          expect(oracleMatches(d, word)).toBe(
            oracleMatches(pattern, [sym, ...word])
          );
        }
      }
    }
  );
});

describe('nullable', () => {
  test('agrees with matching the empty word', () => {
    for (const pattern of patterns) {
      expect([label(pattern), nullable(pattern)]).toEqual([
        label(pattern),
        oracleMatches(pattern, []),
      ]);
    }
  });
});

describe('algebraic identities', () => {
  const sample = patterns.slice(0, 40);
  const words = allWords(syms, 4);

  test('p|∅ matches what p matches', () => {
    for (const p of sample) {
      for (const word of words) {
        expect(matches(union(p, noMatch()), word)).toBe(matches(p, word));
      }
    }
  });

  test('εp and pε match what p matches', () => {
    for (const p of sample) {
      for (const word of words) {
        expect(matches(concat(empty(), p), word)).toBe(matches(p, word));
        expect(matches(concat(p, empty()), word)).toBe(matches(p, word));
      }
    }
  });

  test('p* matches a nonempty word iff it splits into p and p*', () => {
    for (const p of sample) {
      const star = repeat(p);
      for (const word of words.filter((w) => w.length > 0)) {
        let unrolled = false;
        for (let i = 1; i <= word.length; i++) {
          if (
            matches(p, word.slice(0, i)) &&
            matches(star, word.slice(i))
          ) {
            unrolled = true;
          }
        }
        expect(matches(star, word)).toBe(unrolled);
      }
    }
  });
});
