// ============================================================================
// @treekey/core — Public API
// ============================================================================

// Key Combiner
export {
  combineUniquely,
  combineLoosely,
  createKeySpace,
  keyMask,
  formatKey,
  DEFAULT_KEY_WIDTH,
  GOLDEN_RATIO_MAGIC,
  ZERO_KEY,
} from './keys.js';
export type { Key, KeySpace, KeyWidth } from './keys.js';

// Text hashing
export {
  sha256TextHasher,
  fnv1aTextHasher,
  resolveTextHasher,
  DEFAULT_TEXT_HASHER,
} from './text_hash.js';
export type { TextHasher, TextHasherName } from './text_hash.js';

// Node Key Computer
export { NodeKeyComputer, keyOfAttribute, attributesKey, nodeKey } from './node_key.js';
export type { AttributeView, NodeView, DocumentView, NodeKeyOptions } from './node_key.js';

// Document Matcher
export { DocumentMatcher, matchLoosely } from './matcher.js';
export type { MatchOptions, MatchResult } from './matcher.js';
export { isStructurallyEquivalent } from './structural.js';

// XML tree provider
export { parseXmlDocument, XmlDocumentView, XmlNodeView } from './xml.js';

// Configuration
export { resolveMatcherConfig, toMatchOptions, CONFIG_ENV_VARS } from './config.js';
export type { MatcherConfig, ConfigKey, RawConfig } from './config.js';

// Logging
export { debug, info, warn, error, onLog, timer, Timer, setLogLevel, getLogLevel } from './logger.js';
export type { LogLevel, LogEntry, LogCallback } from './logger.js';

// Errors
export {
  TreekeyError,
  XmlParseError,
  SourceLoadError,
  TreeDepthExceededError,
  ConfigError,
  SuiteDefinitionError,
} from './errors.js';
