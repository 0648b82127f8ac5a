export * from './derivatives/pattern.js';
export * from './derivatives/builder.js';
export { nullable } from './derivatives/nullable.js';
export { derive, deriveAll } from './derivatives/derive.js';
export {
  Matcher,
  type MatcherOptions,
  builderFor,
  matches,
} from './derivatives/matcher.js';
export { alphabet, words } from './derivatives/language.js';
export { oracleMatches } from './derivatives/oracle.js';
export {
  Lexer,
  Token,
  type Lexeme,
  type Span,
} from './regex-compiler/lexer.js';
export { RegexParser, parsePattern } from './regex-compiler/parser.js';
export { PatternSyntaxError } from './regex-compiler/errors.js';
export { Regex } from './regex-compiler/regex.js';
