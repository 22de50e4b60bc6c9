/**
 * CLI entry point using Commander.js.
 * Routes between MCP server (default) and one-shot discovery.
 */
import { Command } from 'commander';
import { startServer } from '../mcp/server.js';
import { VERSION } from '../version.js';
import type { DiscoverCommandOptions } from './commands/discover.js';

/**
 * Create and configure the CLI program.
 * @returns Configured Commander program
 */
export function createCLI(): Command {
  const program = new Command();

  program
    .name('dav-discovery')
    .description('CalDAV/CardDAV service discovery as an MCP server and command line tool')
    .version(VERSION);

  // Default action: start MCP server (no subcommand)
  program.action(async () => {
    await startServer();
  });

  program
    .command('discover')
    .description('Discover CalDAV/CardDAV services for a URL or email address and print them as JSON')
    .argument('<uri>', 'https:// or http:// URL, mailto: URI or email address')
    .option('-u, --user <name>', 'user name for HTTP Basic authentication (default: DAV_USERNAME)')
    .option('-p, --password <password>', 'password for HTTP Basic authentication (default: DAV_PASSWORD)')
    .option('--no-preemptive', 'wait for an authentication challenge before sending credentials')
    .option('-v, --verbose', 'log every request to stderr')
    .action(async (uri: string, options: DiscoverCommandOptions) => {
      const { runDiscover } = await import('./commands/discover.js');
      await runDiscover(uri, options);
    });

  return program;
}

/**
 * Run the CLI program.
 * Uses parseAsync for proper async action handling.
 */
export async function runCLI(): Promise<void> {
  const program = createCLI();
  await program.parseAsync(process.argv);
}
