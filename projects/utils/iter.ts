export function collect<T>(it: Iterator<T>): T[] {
  let values: T[] = [];
  let result = it.next();
  while (!result.done) {
    values.push(result.value);
    result = it.next();
  }
  return values;
}

export function* range(start: number, end: number) {
  for (let i = start; i < end; i++) {
    yield i;
  }
}

export type CodePoint = { char: string; from: number; to: number };

/**
 * Iterate over the code points of a string together with the
 * utf-16 offsets they span.
 */
export function* codePoints(input: string): Generator<CodePoint, void> {
  let from = 0;
  for (const char of input) {
    yield { char, from, to: from + char.length };
    from += char.length;
  }
}
