/**
 * Domain name core -- public API re-exports.
 */

// Types
export {
  SEPARATOR,
  MAX_LABEL_LENGTH,
  MAX_NAME_LENGTH,
  LABEL_LENGTH_CEILING,
  NAME_LENGTH_CEILING,
  ACE_PREFIX,
  type Result,
  toHex,
} from "./types.js";

// Errors
export {
  type FqdnErrorCode,
  FqdnError,
  EmptyLabelError,
  LabelTooLongError,
  NameTooLongError,
  InvalidCharacterError,
  InvalidHyphenPlacementError,
  CodecFailureError,
  MalformedSeparatorsError,
  InvalidStructureError,
  MissingTerminatorError,
} from "./errors.js";

// Rules
export {
  type RuleSet,
  type RuleName,
  DEFAULT_RULES,
  STRICT_RULES,
  defineRules,
  rulesFromString,
  describeRules,
  sameRules,
} from "./rules.js";

// Codec
export { type LabelCodec, punycodeCodec, isAscii } from "./codec.js";

// Label
export { type ParseOptions, Label } from "./label.js";

// Fqdn
export { Fqdn, fqdn } from "./fqdn.js";
