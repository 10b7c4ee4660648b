#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import colors from '../utils/colors.js';
import { consoleLogger, createLevelLogger, silentLogger } from '../types/logger.js';
import { DEFAULT_LOOKUP_OPTIONS } from '../core/options.js';
import { AbortError, WhoisError } from '../core/errors.js';
import { rawQuery, resolve } from '../whois/resolver.js';
import { formatReport, toReport } from './format.js';

interface CliOptions {
  server: string;
  port: number;
  encoding: string;
  timeout: number;
  retries: number;
  rethrow?: boolean;
  raw?: boolean;
  json?: boolean;
  verbose?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

const program = new Command();

program
  .name('whois-chase')
  .description('WHOIS lookup that follows registry referrals')
  .argument('<query>', 'Domain name or IP address')
  .option('-s, --server <host>', 'Bootstrap WHOIS server', DEFAULT_LOOKUP_OPTIONS.server)
  .option('-p, --port <number>', 'TCP port of the bootstrap server', parseInteger, DEFAULT_LOOKUP_OPTIONS.port)
  .option('-e, --encoding <charset>', 'Charset of the responses', DEFAULT_LOOKUP_OPTIONS.encoding)
  .option('-t, --timeout <seconds>', 'Connect and per-read timeout in seconds', parseInteger, DEFAULT_LOOKUP_OPTIONS.timeout / 1000)
  .option('-r, --retries <number>', 'Attempts per server', parseInteger, DEFAULT_LOOKUP_OPTIONS.retries)
  .option('--rethrow', 'Fail on connection errors instead of returning an empty response')
  .option('--raw', 'Query the server once, without following referrals')
  .option('-j, --json', 'Print the result as JSON')
  .option('-v, --verbose', 'Log hops and referrals')
  .action(async (query: string, options: CliOptions) => {
    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());

    const logger = options.verbose ? createLevelLogger(consoleLogger, 'debug') : silentLogger;
    const common = {
      port: options.port,
      encoding: options.encoding,
      timeout: options.timeout * 1000,
      rethrowErrors: options.rethrow ?? false,
      signal: controller.signal,
      logger,
    };

    try {
      if (options.raw) {
        const text = await rawQuery(query, options.server, common);
        console.log(options.json ? JSON.stringify({ server: options.server, raw: text }, null, 2) : text);
        return;
      }

      const result = await resolve(query, { ...common, server: options.server, retries: options.retries });
      console.log(options.json ? JSON.stringify(toReport(result), null, 2) : formatReport(query, result));
    } catch (error) {
      if (error instanceof AbortError) {
        console.error(colors.yellow('Lookup aborted.'));
        process.exitCode = 130;
        return;
      }
      if (error instanceof WhoisError) {
        console.error(colors.red(`WHOIS lookup failed: ${error.message}`));
        for (const suggestion of error.suggestions) {
          console.error(colors.gray(`  - ${suggestion}`));
        }
        process.exitCode = 1;
        return;
      }
      throw error;
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(colors.red(error instanceof Error ? error.message : String(error)));
  process.exitCode = 1;
});
