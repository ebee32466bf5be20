import { WhoisError } from '../core/errors.js';
import { silentLogger, type Logger } from '../types/logger.js';
import { AvailabilityClassifier, type Availability } from './classifier.js';
import { queryServer, WHOIS_PORT } from './query.js';
import { defaultRegistry, type ServerListOptions, type TldRegistry } from './registry.js';
import { Resolver } from './resolver.js';

/**
 * WHOIS Client options
 */
export interface WhoisClientOptions {
  /**
   * Suffix → server table
   * @default the built-in root zone table
   */
  registry?: TldRegistry;

  classifier?: AvailabilityClassifier;

  /**
   * Query this server for every domain instead of resolving one
   */
  server?: string;

  /**
   * @default 43
   */
  port?: number;

  /**
   * Query deadline in milliseconds, 0 for none
   * @default 10000
   */
  timeout?: number;

  logger?: Logger;
}

export interface LookupOptions {
  /**
   * Server for this call only
   */
  server?: string;
  signal?: AbortSignal;
}

export interface LookupResult {
  domain: string;
  server: string;
  /**
   * Text sent to the server, without the CRLF
   */
  query: string;
  raw: string;
}

export interface CheckResult extends LookupResult {
  availability: Availability;
}

export interface CheckAllOptions {
  /**
   * Throw the first WHOIS error instead of reporting it and moving on
   * @default false
   */
  stopOnError?: boolean;
  signal?: AbortSignal;
}

export type CheckAllItem =
  | { domain: string; ok: true; result: CheckResult }
  | { domain: string; ok: false; error: WhoisError };

/**
 * WHOIS Client class
 *
 * @example
 * ```typescript
 * const whoisClient = createWhois({ timeout: 15000 });
 *
 * const { raw } = await whoisClient.lookup('example.com');
 * const { availability } = await whoisClient.check('my-new-domain.com');
 *
 * for await (const item of whoisClient.checkAll(['a.com', 'b.com'])) {
 *   console.log(item.domain, item.ok ? item.result.availability : item.error.message);
 * }
 * ```
 */
export class WhoisClient {
  private readonly resolver: Resolver;
  private readonly classifier: AvailabilityClassifier;
  private readonly server?: string;
  private readonly port: number;
  private readonly timeout: number;
  private readonly logger: Logger;

  constructor(options: WhoisClientOptions = {}) {
    this.resolver = new Resolver(options.registry ?? defaultRegistry());
    this.classifier = options.classifier ?? new AvailabilityClassifier();
    this.server = options.server || undefined;
    this.port = options.port ?? WHOIS_PORT;
    this.timeout = options.timeout ?? 10000;
    this.logger = options.logger ?? silentLogger;
  }

  get registry(): TldRegistry {
    return this.resolver.registry;
  }

  /**
   * Server that would be queried for `domain`
   */
  resolve(domain: string, override?: string): string {
    return override || this.server || this.resolver.resolve(domain);
  }

  /**
   * Raw WHOIS record for a domain
   */
  async lookup(domain: string, options: LookupOptions = {}): Promise<LookupResult> {
    const name = domain.trim();
    return this.run(name, name, options);
  }

  /**
   * Query with the `domain` keyword and classify the answer
   */
  async check(domain: string, options: LookupOptions = {}): Promise<CheckResult> {
    const name = domain.trim();
    const result = await this.run(name, `domain ${name}`, options);
    const availability = this.classifier.classify(result.server, result.raw, name);

    this.logger.debug({ domain: name, server: result.server, availability }, 'WHOIS availability');
    return { ...result, availability };
  }

  /**
   * Check domains one at a time, in order.
   * Blank entries are skipped and every domain is resolved on its own.
   * Aborting `signal` ends the batch with the abort error.
   */
  async *checkAll(domains: Iterable<string>, options: CheckAllOptions = {}): AsyncGenerator<CheckAllItem> {
    const { signal } = options;

    for (const entry of domains) {
      const domain = entry.trim();
      if (!domain) continue;
      signal?.throwIfAborted();

      try {
        const result = await this.check(domain, { signal });
        yield { domain, ok: true, result };
      } catch (error) {
        if (options.stopOnError || signal?.aborted || !(error instanceof WhoisError)) {
          throw error;
        }
        this.logger.debug({ domain, err: error }, 'WHOIS check failed');
        yield { domain, ok: false, error };
      }
    }
  }

  /**
   * Suffixes with a known server
   */
  servers(options?: ServerListOptions): Array<{ suffix: string; server: string }> {
    return this.registry.servers(options);
  }

  private async run(domain: string, query: string, options: LookupOptions): Promise<LookupResult> {
    const server = this.resolve(domain, options.server);
    this.logger.debug({ domain, server }, 'WHOIS lookup');
    const start = Date.now();

    const raw = await queryServer(server, query, {
      port: this.port,
      timeout: this.timeout,
      signal: options.signal,
      logger: this.logger,
    });

    this.logger.debug({ domain, server, ms: Date.now() - start }, 'WHOIS lookup completed');
    return { domain, server, query, raw };
  }
}

/**
 * Create a WHOIS client
 */
export function createWhois(options?: WhoisClientOptions): WhoisClient {
  return new WhoisClient(options);
}
