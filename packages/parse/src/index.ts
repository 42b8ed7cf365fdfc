/**
 * @inkwell/parse
 *
 * The parsing core shared by every inkwell grammar.
 *
 * Provides:
 * - Immutable source positions and value-based parse results
 * - PEG-style combinators with furthest-failure reporting
 * - O(1) character classifiers and character-run parsers
 * - Delimited text scanning
 * - Prefixed parsers and single-character dispatch
 * - The recursive span engine
 *
 * @module
 */

export { SourcePosition } from "./position.js";
export type { ParseResult, Success, Failure, Parser } from "./types.js";

export {
  ParserBase,
  ParseError,
  mkParser,
  ok,
  fail,
  furthest,
  success,
  failure,
  literal,
  char,
  oneChar,
  regex,
  eof,
  eol,
  seq,
  seq3,
  skipLeft,
  skipRight,
  alt,
  alternatives,
  rep,
  many,
  many1,
  optional,
  not,
  lookAhead,
  map,
  as,
  flatMap,
  withSource,
  withPosition,
  consumeAll,
  sepBy,
  sepBy1,
  between,
  lazy,
  quotedString,
} from "./combinators.js";

export {
  Characters,
  CharGroup,
  charLookup,
  rangeLookup,
  anyOf,
  anyBut,
  anyIn,
  anyWhile,
  someOf,
  oneOf,
  type CharPredicate,
} from "./characters.js";

export {
  DelimitedScanner,
  delimitedBy,
  anyUntil,
  undelimited,
  type DelimitedText,
  type DelimitedEnd,
} from "./delimited.js";

export {
  PrefixedParser,
  prefixed,
  orderByPrecedence,
  mergePrefixed,
  dispatch,
  type ParserDefinition,
  type PrefixedGroups,
  type Precedence,
} from "./prefixed.js";

export {
  spans,
  escapedText,
  DEFAULT_MAX_NESTING_LEVEL,
  type NodeAlgebra,
  type SpanEngineOptions,
} from "./spans.js";
