/**
 * Availability classifier
 * Decides from a raw WHOIS response whether a domain is free or taken
 */

export const Availability = {
  Free: 'free',
  Taken: 'taken',
  Unknown: 'unknown',
} as const;

export type Availability = (typeof Availability)[keyof typeof Availability];

/**
 * Server-specific test of a response. Must be pure and must not throw.
 */
export type AvailabilityMatcher = (response: string, domain: string) => Availability;

/**
 * Literal text, or text built from the queried domain
 */
export type Phrase = string | ((domain: string) => string);

export interface PhraseMatcherOptions {
  free?: Phrase[];
  taken?: Phrase[];
}

/**
 * Build a matcher from substring tests. Free phrases are checked first.
 *
 * @example
 * ```typescript
 * const matcher = createPhraseMatcher({
 *   free: [(domain) => `NOT FOUND: ${domain}`],
 *   taken: ['Registrar:'],
 * });
 * ```
 */
export function createPhraseMatcher(options: PhraseMatcherOptions): AvailabilityMatcher {
  const free = options.free ?? [];
  const taken = options.taken ?? [];

  return (response, domain) => {
    const contains = (phrase: Phrase) =>
      response.includes(typeof phrase === 'string' ? phrase : phrase(domain));

    if (free.some(contains)) return Availability.Free;
    if (taken.some(contains)) return Availability.Taken;
    return Availability.Unknown;
  };
}

export const verisignMatcher = createPhraseMatcher({
  free: [(domain) => `No match for domain "${domain.toUpperCase()}"`],
  taken: ['Registrar:'],
});

export const DEFAULT_RULES: Readonly<Record<string, AvailabilityMatcher>> = {
  'whois.verisign-grs.com': verisignMatcher,
};

/**
 * Open table of server → matcher rules.
 * Responses from servers without a rule classify as unknown.
 */
export class AvailabilityClassifier {
  private readonly rules: ReadonlyMap<string, AvailabilityMatcher>;

  constructor(rules: Readonly<Record<string, AvailabilityMatcher>> = DEFAULT_RULES) {
    this.rules = new Map(
      Object.entries(rules).map(([server, matcher]): [string, AvailabilityMatcher] => [server.toLowerCase(), matcher])
    );
  }

  classify(server: string, response: string, domain: string): Availability {
    const matcher = this.rules.get(server.toLowerCase());
    return matcher ? matcher(response, domain.trim()) : Availability.Unknown;
  }

  /**
   * New classifier with `matcher` registered for `server`
   */
  withRule(server: string, matcher: AvailabilityMatcher): AvailabilityClassifier {
    return new AvailabilityClassifier({
      ...Object.fromEntries(this.rules),
      [server.toLowerCase()]: matcher,
    });
  }

  servers(): string[] {
    return [...this.rules.keys()];
  }
}

const defaultClassifier = new AvailabilityClassifier();

export function classify(server: string, response: string, domain: string): Availability {
  return defaultClassifier.classify(server, response, domain);
}
