import { Regex } from './regex.js';

const cases: [string, { matches: string[]; fails?: string[] }][] = [
  ['a', { matches: ['a'], fails: ['', 'b', 'aa'] }],
  ['\n', { matches: ['\n'] }],
  [
    '(a|b)*abb',
    {
      matches: ['abb', 'ababb', 'aaaaabb', 'bbaabaababababb'],
      fails: ['ab', 'abba'],
    },
  ],
  ['ab*b', { matches: ['ab', 'abbb'], fails: ['a'] }],
  // plus operator
  ['a+b', { matches: ['ab', 'aaab'], fails: ['b'] }],
  ['(ab)+', { matches: ['ab', 'abababab'], fails: [''] }],
  ['colou?r', { matches: ['color', 'colour'], fails: ['colouur'] }],
  // escapes
  ['\\(a\\)', { matches: ['(a)'], fails: ['a'] }],
  ['a\\|b', { matches: ['a|b'], fails: ['a', 'b'] }],
  ['ε', { matches: [''], fails: ['a'] }],
  ['∅', { matches: [], fails: ['', 'a'] }],
  // empty alternatives
  [
    '(|a)(b|c*)',
    {
      matches: ['ab', 'a', '', 'b', 'cccccc', 'c', 'cc', 'ac', 'accc'],
      fails: ['aa', 'abb', 'abc', 'bc', 'ca'],
    },
  ],
  // nullable left operands all the way down
  ['(a*b*)*c', { matches: ['c', 'abababc', 'bbac'], fails: ['', 'ca'] }],
];

describe.each([true, false])('simplify: %p', (simplify) => {
  test.each(cases)(`matches %p`, (pattern, { matches, fails = [] }) => {
    const regex = new Regex(pattern, { simplify });
    for (const input of matches) {
      expect([input, regex.test(input)]).toEqual([input, true]);
    }
    for (const input of fails) {
      expect([input, regex.test(input)]).toEqual([input, false]);
    }
  });
});

test('toString prints the parsed pattern', () => {
  expect(new Regex('a+(b|c)?').toString()).toBe('aa*(ε|b|c)');
});

test('matches a long literal without deep recursion', () => {
  const text = 'ab'.repeat(10000);
  const regex = new Regex(text);
  expect(regex.test(text)).toBe(true);
  expect(regex.test(text.slice(1))).toBe(false);
  expect(regex.test(text + 'a')).toBe(false);
  expect(regex.test(text.slice(0, -1) + 'a')).toBe(false);
});

test('rejects bad syntax', () => {
  expect(() => new Regex('a|*')).toThrow(
    'PatternSyntaxError at 2: Expected * operator to follow another expression'
  );
});
