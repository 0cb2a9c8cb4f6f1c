/**
 * Passive scan command
 */

import { Command } from 'commander';
import { CrtShEnumerator, runPassiveScan } from '../../passive/index.js';
import { NodeDnsResolver } from '../../core/resolver.js';
import { describeError } from '../../core/errors.js';
import { HttpClient } from '../../utils/http.js';
import {
  CommandOutput,
  createCliLogger,
  resolveTargets,
  withInterrupt,
  type OutputFlags,
} from '../shared.js';

interface PassiveFlags extends OutputFlags {
  domain?: string;
  list?: string;
  showIp: boolean;
}

export const passiveCommand = new Command('passive')
  .description('Enumerate subdomains from certificate transparency logs')
  .option('-d, --domain <domain>', 'Target domain (e.g., example.com)')
  .option('-l, --list <file>', 'File containing a list of domains')
  .option('-s, --show-ip', 'Show IP addresses of discovered subdomains', false)
  .option('-o, --output <file>', 'Save results to a text file')
  .option('-j, --json-output <file>', 'Save results as JSON')
  .option('-q, --quiet', 'Only print results', false)
  .option('--debug', 'Verbose logging', false)
  .action(async (flags: PassiveFlags) => {
    const logger = createCliLogger(flags);
    const domains = await resolveTargets(flags.domain, flags.list);
    const output = new CommandOutput(flags, domains);
    const http = new HttpClient({ timeout: 30000 });
    const enumerator = new CrtShEnumerator(http, logger);
    const resolver = new NodeDnsResolver();

    try {
      await withInterrupt(logger, async (signal) => {
        for (const domain of domains) {
          if (signal.aborted) {
            break;
          }
          try {
            const results = await runPassiveScan(domain, enumerator, {
              showIps: flags.showIp,
              resolver,
              sink: output.forScan(),
              logger,
            });
            logger.success(`${domain}: ${results.length} subdomains`);
          } catch (error) {
            logger.error(`Passive scan failed for ${domain}: ${describeError(error)}`);
            process.exitCode = 1;
          }
        }
      });
    } finally {
      await http.close();
      await output.close(logger);
    }
  });
