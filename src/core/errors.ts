export class WhoisError extends Error {
  suggestions: string[];
  retriable: boolean;

  constructor(
    message: string,
    suggestions: string[] = [],
    retriable = false,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'WhoisError';
    this.suggestions = suggestions;
    this.retriable = retriable;
  }
}

/**
 * The domain's TLD has no WHOIS server in the registry.
 *
 * Raised both for suffixes the registry has never heard of and for suffixes
 * it lists without a public server; `suffix` is null when the domain has no
 * separator at all.
 */
export class ResolutionError extends WhoisError {
  domain: string;
  suffix: string | null;

  constructor(domain: string, suffix: string | null) {
    const message = suffix === null
      ? `Cannot extract a TLD from "${domain}"`
      : `No WHOIS server found for TLD ${suffix}`;

    super(message, [
      'Pass a fully qualified domain name such as example.com.',
      'Use --server to query a WHOIS server directly.',
      'Run `whoiskit servers` to see the known TLDs.'
    ]);
    this.name = 'ResolutionError';
    this.domain = domain;
    this.suffix = suffix;
  }
}

export interface QueryErrorOptions {
  code?: string;
  cause?: unknown;
  retriable?: boolean;
}

/**
 * Network failure while talking to a WHOIS server
 */
export class QueryError extends WhoisError {
  server: string;
  code?: string;

  constructor(server: string, message: string, options: QueryErrorOptions = {}) {
    super(
      message,
      [
        'Verify the WHOIS server is reachable and correct.',
        'Check network/firewall settings blocking WHOIS port 43.',
        'Retry the query; transient network issues can occur.'
      ],
      options.retriable ?? true,
      options.cause === undefined ? undefined : { cause: options.cause }
    );
    this.name = 'QueryError';
    this.server = server;
    this.code = options.code;
  }
}

export class RegistryError extends WhoisError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, ['Registry files map each suffix to a hostname or null, e.g. { ".com": "whois.verisign-grs.com" }.'], false, options);
    this.name = 'RegistryError';
  }
}

export class ConfigError extends WhoisError {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, [
      'Check the WHOIS_* environment variables and command line flags.'
    ]);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
