export {
  WhoisError,
  ResolutionError,
  QueryError,
  RegistryError,
  ConfigError,
} from './core/errors.js';
export type { QueryErrorOptions } from './core/errors.js';

export {
  TldRegistry,
  NO_SERVER,
  normalizeSuffix,
  defaultRegistry,
} from './whois/registry.js';
export type { RegistryEntry, RegistryLookup, ServerListOptions } from './whois/registry.js';

export { Resolver, extractSuffix, resolveServer } from './whois/resolver.js';

export { queryServer, WHOIS_PORT, MAX_TIMEOUT } from './whois/query.js';
export type { QueryOptions } from './whois/query.js';

export {
  Availability,
  AvailabilityClassifier,
  createPhraseMatcher,
  verisignMatcher,
  DEFAULT_RULES,
  classify,
} from './whois/classifier.js';
export type { AvailabilityMatcher, Phrase, PhraseMatcherOptions } from './whois/classifier.js';

export { WhoisClient, createWhois } from './whois/client.js';
export type {
  WhoisClientOptions,
  LookupOptions,
  LookupResult,
  CheckResult,
  CheckAllOptions,
  CheckAllItem,
} from './whois/client.js';

export { loadConfig, WhoisConfigSchema, ENV_KEYS } from './config.js';
export type { WhoisConfig, ConfigInput } from './config.js';

export { consoleLogger, silentLogger, createLevelLogger } from './types/logger.js';
export type { Logger, LogLevel } from './types/logger.js';
export { createLogger } from './utils/logger.js';
