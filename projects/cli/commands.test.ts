import { runMatch, runShow, runTrace, runWords } from './commands.js';

describe('match', () => {
  test('marks each input', () => {
    expect(runMatch('(a|b)*abb', ['abb', 'ab', ''])).toEqual({
      lines: ['✓ "abb"', '✗ "ab"', '✗ ""'],
      exitCode: 1,
    });
  });

  test('exits cleanly when everything matches', () => {
    expect(runMatch('a*', ['', 'aaa']).exitCode).toBe(0);
  });

  test('verbose shows each derivative', () => {
    expect(runMatch('ab', ['ab'], { verbose: true }).lines).toEqual([
      '  1: "a" -> b',
      '  2: "b" -> ε',
      '✓ "ab"',
    ]);
  });

  test('reports syntax errors', () => {
    expect(runMatch('a)', ['a'])).toEqual({
      lines: [
        ['PatternSyntaxError at 1: Unmatched )', '  1: a)', '  ----^'].join(
          '\n'
        ),
      ],
      exitCode: 1,
    });
  });
});

describe('trace', () => {
  test('accepted', () => {
    expect(runTrace('ab', 'ab')).toEqual({
      lines: ['0: ab', '1: "a" -> b', '2: "b" -> ε', 'accepted'],
      exitCode: 0,
    });
  });

  test('rejected', () => {
    expect(runTrace('ab', 'ba')).toEqual({
      lines: ['0: ab', '1: "b" -> ∅', '2: "a" -> ∅', 'rejected'],
      exitCode: 1,
    });
  });

  test('without simplification', () => {
    expect(runTrace('ab', 'a', { simplify: false }).lines).toEqual([
      '0: ab',
      '1: "a" -> εb',
      'rejected',
    ]);
  });
});

test('words', () => {
  expect(runWords('a*b', 3)).toEqual({
    lines: ['"b"', '"ab"', '"aab"'],
    exitCode: 0,
  });
});

test('show', () => {
  expect(runShow('a|b*').lines).toEqual([
    'a|b*',
    '{"kind":"UNION","left":{"kind":"LITERAL","sym":"a"},' +
      '"right":{"kind":"REPEAT","inner":{"kind":"LITERAL","sym":"b"}}}',
    'nullable: true',
    'size: 4',
    'alphabet: a b',
  ]);
});
