/**
 * TLD registry
 * Maps a domain suffix to the WHOIS server that is authoritative for it
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { RegistryError } from '../core/errors.js';

/**
 * Marks a suffix that exists but has no public WHOIS server.
 * Distinct from a suffix that is missing from the registry.
 */
export const NO_SERVER = null;

export type RegistryEntry = readonly [suffix: string, server: string | null];

export type RegistryLookup =
  | { status: 'server'; server: string }
  | { status: 'no-server' }
  | { status: 'unlisted' };

export interface ServerListOptions {
  /**
   * Include internationalized (`.xn--`) suffixes
   * @default false
   */
  includeIdn?: boolean;
}

const RegistryFileSchema = z.record(z.string().min(1), z.string().min(1).nullable());

const DEFAULT_REGISTRY_FILE = fileURLToPath(new URL('../../data/root-zone.json', import.meta.url));

/**
 * Lower-case a suffix and make sure it starts with a dot
 */
export function normalizeSuffix(suffix: string): string {
  const lower = suffix.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

/**
 * Immutable suffix → server table
 *
 * @example
 * ```typescript
 * const registry = TldRegistry.fromRecord({
 *   '.com': 'whois.verisign-grs.com',
 *   '.ad': NO_SERVER,
 * });
 *
 * registry.lookup('.COM'); // { status: 'server', server: 'whois.verisign-grs.com' }
 * registry.lookup('.ad');  // { status: 'no-server' }
 * registry.lookup('.zz');  // { status: 'unlisted' }
 * ```
 */
export class TldRegistry implements Iterable<RegistryEntry> {
  private readonly entries: ReadonlyMap<string, string | null>;

  constructor(entries: Iterable<RegistryEntry>) {
    const map = new Map<string, string | null>();

    for (const [rawSuffix, server] of entries) {
      const suffix = normalizeSuffix(rawSuffix);
      if (suffix === '.') {
        throw new RegistryError(`Invalid registry suffix "${rawSuffix}"`);
      }
      if (map.has(suffix)) {
        throw new RegistryError(`Duplicate registry suffix ${suffix}`);
      }
      if (server !== null && server.trim() === '') {
        throw new RegistryError(`Empty WHOIS server for suffix ${suffix}`);
      }
      map.set(suffix, server === null ? NO_SERVER : server.trim());
    }

    this.entries = map;
  }

  static fromRecord(record: Readonly<Record<string, string | null>>): TldRegistry {
    return new TldRegistry(Object.entries(record));
  }

  /**
   * Load a registry from a JSON file shaped like `data/root-zone.json`
   */
  static fromFile(path: string): TldRegistry {
    let json: unknown;
    try {
      json = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new RegistryError(`Cannot read registry file ${path}`, { cause: error });
    }

    const parsed = RegistryFileSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.length ? ` at ${issue.path.join('.')}` : '';
      throw new RegistryError(`Invalid registry file ${path}${where}: ${issue?.message ?? 'unknown error'}`);
    }

    return TldRegistry.fromRecord(parsed.data);
  }

  get size(): number {
    return this.entries.size;
  }

  has(suffix: string): boolean {
    return this.entries.has(normalizeSuffix(suffix));
  }

  lookup(suffix: string): RegistryLookup {
    const key = normalizeSuffix(suffix);
    if (!this.entries.has(key)) {
      return { status: 'unlisted' };
    }

    const server = this.entries.get(key);
    return server ? { status: 'server', server } : { status: 'no-server' };
  }

  /**
   * Suffixes that have a server, in registry order
   */
  servers(options: ServerListOptions = {}): Array<{ suffix: string; server: string }> {
    const list: Array<{ suffix: string; server: string }> = [];
    for (const [suffix, server] of this.entries) {
      if (server === null) continue;
      if (!options.includeIdn && suffix.startsWith('.xn--')) continue;
      list.push({ suffix, server });
    }
    return list;
  }

  /**
   * Return a new registry with the given entries added or replaced
   */
  extend(entries: Iterable<RegistryEntry> | Readonly<Record<string, string | null>>): TldRegistry {
    const merged = new Map(this.entries);
    const additions = isIterable(entries) ? entries : Object.entries(entries);
    for (const [suffix, server] of additions) {
      merged.set(normalizeSuffix(suffix), server);
    }
    return new TldRegistry(merged);
  }

  [Symbol.iterator](): Iterator<RegistryEntry> {
    return this.entries.entries();
  }
}

function isIterable(value: object): value is Iterable<RegistryEntry> {
  return Symbol.iterator in value;
}

let rootZone: TldRegistry | undefined;

/**
 * The built-in IANA root zone table, loaded once per process
 */
export function defaultRegistry(): TldRegistry {
  rootZone ??= TldRegistry.fromFile(DEFAULT_REGISTRY_FILE);
  return rootZone;
}
