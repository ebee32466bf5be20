import { ResolutionError } from '../core/errors.js';
import { defaultRegistry, type TldRegistry } from './registry.js';

/**
 * Extract the TLD suffix from a domain name, including the leading dot
 *
 * @example
 * extractSuffix('Example.COM') // '.com'
 */
export function extractSuffix(domain: string): string {
  const clean = domain.trim().toLowerCase();
  const dot = clean.lastIndexOf('.');
  if (dot === -1) {
    throw new ResolutionError(domain, null);
  }
  return clean.slice(dot);
}

/**
 * Finds the WHOIS server responsible for a domain.
 * Suffixes missing from the registry and suffixes listed without a server
 * fail the same way.
 */
export class Resolver {
  readonly registry: TldRegistry;

  constructor(registry: TldRegistry = defaultRegistry()) {
    this.registry = registry;
  }

  resolve(domain: string): string {
    const suffix = extractSuffix(domain);
    const entry = this.registry.lookup(suffix);
    if (entry.status !== 'server') {
      throw new ResolutionError(domain, suffix);
    }
    return entry.server;
  }
}

export function resolveServer(domain: string, registry: TldRegistry = defaultRegistry()): string {
  return new Resolver(registry).resolve(domain);
}
