/**
 * Discover command - run service discovery once and print the configuration.
 * JSON goes to stdout; the diagnostic log goes to stderr when nothing was found.
 */
import { loadConfig } from '../../config/schema.js';
import { createLogger } from '../../config/logger.js';
import { discover } from '../../discovery/orchestrator.js';
import { formatStartupError } from '../../errors.js';
import { hasAnyService, transformConfiguration } from '../../transformers/configuration.js';

export interface DiscoverCommandOptions {
  user?: string;
  password?: string;
  /** false when --no-preemptive was given */
  preemptive?: boolean;
  verbose?: boolean;
}

/**
 * Discover CalDAV/CardDAV services for `uri`.
 * Sets process.exitCode to 1 when the input is unusable or no service was found.
 */
export async function runDiscover(uri: string, options: DiscoverCommandOptions): Promise<void> {
  try {
    const config = loadConfig();
    const logger = options.verbose ? createLogger('debug') : undefined;

    const configuration = await discover(
      uri,
      {
        userName: options.user ?? config.DAV_USERNAME,
        password: options.password ?? config.DAV_PASSWORD,
        preemptiveAuth: options.preemptive === false ? false : config.DAV_PREEMPTIVE_AUTH,
      },
      {
        logger,
        requestTimeout: config.DAV_REQUEST_TIMEOUT,
        dnsTimeout: config.DAV_DNS_TIMEOUT,
      }
    );

    process.stdout.write(`${JSON.stringify(transformConfiguration(configuration), null, 2)}\n`);

    if (!hasAnyService(configuration)) {
      process.stderr.write(`\nNo CalDAV or CardDAV service found for ${uri}.\n\n${configuration.diagnosticLog}\n`);
      process.exitCode = 1;
    }
  } catch (error) {
    const errorMessage = formatStartupError(error instanceof Error ? error : new Error(String(error)));
    process.stderr.write(`\n${errorMessage}\n`);
    process.exitCode = 1;
  }
}
