#!/usr/bin/env node
import { program, type Command } from 'commander';
import { readFileSync } from 'node:fs';
import { loadConfig } from '../config.js';
import colors from '../utils/colors.js';
import { createLogger } from '../utils/logger.js';
import { createWhois, type WhoisClient } from '../whois/client.js';
import { defaultRegistry, TldRegistry } from '../whois/registry.js';
import { handleCheck, handleLookup, handleServers, readDomainList, renderError } from './handler.js';

type GlobalOptions = {
  server?: string;
  port?: string;
  timeout?: string;
  registry?: string;
  verbose?: boolean;
};

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // unreadable package.json: fall through to 0.0.0
  }
  return '0.0.0';
}

/**
 * Build a client from WHOIS_* variables and the global flags
 */
function createClientFromOptions(command: Command): WhoisClient {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const config = loadConfig(process.env, {
    server: globals.server,
    port: globals.port,
    timeout: globals.timeout,
    registryFile: globals.registry,
    logLevel: globals.verbose ? 'debug' : undefined,
  });

  return createWhois({
    registry: config.registryFile ? TldRegistry.fromFile(config.registryFile) : defaultRegistry(),
    server: config.server,
    port: config.port,
    timeout: config.timeout,
    logger: createLogger(config.logLevel),
  });
}

/**
 * CLI Entry Point
 */
async function main() {
  program
    .name('whoiskit')
    .description('Query WHOIS servers and check whether domains are free')
    .version(readVersion())
    .option('-w, --server <host>', 'WHOIS server to query instead of the one for the TLD')
    .option('-p, --port <port>', 'WHOIS server port (default: 43)')
    .option('-t, --timeout <ms>', 'Query deadline in milliseconds, 0 for none (default: 10000)')
    .option('-r, --registry <file>', 'JSON file mapping TLD suffixes to WHOIS servers')
    .option('-v, --verbose', 'Log connection details to stderr')
    .addHelpText('after', `
Examples:
  $ whoiskit google.com
  $ whoiskit -w whois.iana.org google.com
  $ whoiskit check example.com my-new-name.com
  $ whoiskit check -i domains.txt
  $ whoiskit servers`);

  program
    .command('lookup', { isDefault: true })
    .description('Print the raw WHOIS record of a domain')
    .argument('<domain>', 'Domain name, e.g. example.com')
    .action(async (domain: string, _options: object, command: Command) => {
      process.exitCode = await handleLookup({ client: createClientFromOptions(command) }, domain);
    });

  program
    .command('check')
    .description('Print FREE, TAKEN or ????? for each domain')
    .argument('[domains...]', 'Domain names')
    .option('-i, --input <file>', 'Read domains from a file, one per line')
    .option('--stop-on-error', 'Abort on the first domain that cannot be checked')
    .action(async (domains: string[], options: { input?: string; stopOnError?: boolean }, command: Command) => {
      const list = options.input ? [...domains, ...(await readDomainList(options.input))] : domains;
      if (list.length === 0) {
        command.error('No domains given. Pass domain names or --input <file>.');
      }

      process.exitCode = await handleCheck(
        { client: createClientFromOptions(command) },
        list,
        { stopOnError: options.stopOnError }
      );
    });

  program
    .command('servers')
    .alias('list')
    .description('List the built-in WHOIS servers by TLD')
    .option('--idn', 'Include internationalized (xn--) TLDs')
    .action((options: { idn?: boolean }, command: Command) => {
      process.exitCode = handleServers({ client: createClientFromOptions(command) }, options);
    });

  await program.parseAsync();
}

main().catch((error: unknown) => {
  for (const line of renderError(error, colors)) {
    console.error(line);
  }
  process.exit(1);
});
