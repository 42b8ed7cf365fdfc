/**
 * @inkwell/config
 *
 * Configuration values, the object-literal grammar used by document headers
 * and directive attribute sections, decoders and path lookup.
 *
 * @module
 */

export {
  isConfigObject,
  isConfigArray,
  mergeObjects,
  fieldsToObject,
  renderValue,
  type ConfigValue,
  type ConfigObject,
  type Field,
} from "./values.js";

export {
  objectMembers,
  wsOrNl,
  MAX_VALUE_NESTING,
  valueUntil,
  typedValue,
  parseFields,
  parseConfigObject,
  parseValue,
  type ParsedValue,
} from "./grammar.js";

export { Decoders, arrayOf, oneOf, decodeSource, decoded, decodeError, type Decoder, type Decoded } from "./decoders.js";

export { Config } from "./config.js";
