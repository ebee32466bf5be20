import { promises as fs } from 'node:fs';
import ora from 'ora';
import { WhoisError } from '../core/errors.js';
import defaultColors, { type Colors } from '../utils/colors.js';
import { Availability } from '../whois/classifier.js';
import type { WhoisClient } from '../whois/client.js';

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

export const stdio: CliOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

export interface HandlerContext {
  client: WhoisClient;
  out?: CliOutput;
  colors?: Colors;
  /**
   * Show a spinner on stderr while waiting for a server
   * @default true
   */
  spinner?: boolean;
}

const STATUS_LABELS: Record<Availability, string> = {
  [Availability.Free]: 'FREE ',
  [Availability.Taken]: 'TAKEN',
  [Availability.Unknown]: '?????',
};

export function formatStatus(availability: Availability, domain: string): string {
  return `[${STATUS_LABELS[availability]}] ${domain}`;
}

function colorStatus(colors: Colors, availability: Availability, line: string): string {
  switch (availability) {
    case Availability.Free:
      return colors.green(line);
    case Availability.Taken:
      return colors.red(line);
    default:
      return colors.yellow(line);
  }
}

/**
 * Error message in red, followed by its suggestions
 */
export function renderError(error: unknown, colors: Colors = defaultColors): string[] {
  const message = error instanceof Error ? error.message : String(error);
  const lines = [colors.red(message)];

  if (error instanceof WhoisError) {
    for (const suggestion of error.suggestions) {
      lines.push(colors.gray(`  → ${suggestion}`));
    }
  }
  return lines;
}

/**
 * One domain per line, blank lines dropped
 */
export async function readDomainList(path: string): Promise<string[]> {
  const content = await fs.readFile(path, 'utf-8');
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

function startSpinner(ctx: HandlerContext, text: string) {
  if (ctx.spinner === false) return null;
  return ora({ text, color: 'cyan', spinner: 'dots' }).start();
}

/**
 * Print the raw WHOIS record of a domain
 */
export async function handleLookup(ctx: HandlerContext, domain: string): Promise<number> {
  const out = ctx.out ?? stdio;
  const colors = ctx.colors ?? defaultColors;
  const server = ctx.client.resolve(domain);
  const spinner = startSpinner(ctx, `${colors.bold(domain)} ${colors.gray(`via ${server}`)}`);

  try {
    const result = await ctx.client.lookup(domain, { server });
    spinner?.stop();
    out.log(result.raw);
    return 0;
  } catch (error) {
    spinner?.fail();
    throw error;
  }
}

/**
 * Print `[FREE ]`, `[TAKEN]` or `[?????]` for each domain.
 * Returns 1 when any domain could not be checked.
 */
export async function handleCheck(
  ctx: HandlerContext,
  domains: string[],
  options: { stopOnError?: boolean } = {}
): Promise<number> {
  const out = ctx.out ?? stdio;
  const colors = ctx.colors ?? defaultColors;
  let failures = 0;

  const spinner = startSpinner(ctx, 'Checking availability');
  try {
    for await (const item of ctx.client.checkAll(domains, { stopOnError: options.stopOnError })) {
      spinner?.clear();
      if (item.ok) {
        const { availability } = item.result;
        out.log(colorStatus(colors, availability, formatStatus(availability, item.domain)));
      } else {
        failures++;
        out.error(colors.red(`[ERROR] ${item.domain}: ${item.error.message}`));
      }
    }
  } finally {
    spinner?.stop();
  }

  return failures > 0 ? 1 : 0;
}

/**
 * List every suffix that has a WHOIS server
 */
export function handleServers(ctx: HandlerContext, options: { idn?: boolean } = {}): number {
  const out = ctx.out ?? stdio;
  for (const { suffix, server } of ctx.client.servers({ includeIdn: options.idn })) {
    out.log(`${suffix.padEnd(24)} ${server}`);
  }
  return 0;
}
