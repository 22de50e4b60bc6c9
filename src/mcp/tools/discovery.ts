/**
 * Discovery MCP tool.
 * Provides discover_dav_services: CalDAV/CardDAV configuration from a URL or email address.
 */
import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';
import type { Config } from '../../config/schema.js';
import type { Logger } from '../../config/logger.js';
import { discover } from '../../discovery/orchestrator.js';
import { DavError } from '../../errors.js';
import { transformConfiguration } from '../../transformers/configuration.js';

/** Discovery only reads from servers, but reaches hosts chosen by the caller */
const DISCOVERY_TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: true,
};

/**
 * Register discovery tools with the MCP server.
 * @param server MCP server instance
 * @param config Environment configuration (default credentials and timeouts)
 * @param logger Logger instance
 */
export function registerDiscoveryTools(server: McpServer, config: Config, logger: Logger): void {
  server.tool(
    'discover_dav_services',
    'Find the CalDAV and CardDAV principal, home sets and collections for a server URL or email address. ' +
      'Returns the configuration as JSON, including a diagnostic log of every step.',
    {
      uri: z
        .string()
        .min(1)
        .describe('https:// or http:// URL of the server, or an email address (mailto: optional)'),
      username: z.string().optional().describe('User name for HTTP Basic authentication (default: DAV_USERNAME)'),
      password: z.string().optional().describe('Password for HTTP Basic authentication (default: DAV_PASSWORD)'),
      preemptiveAuth: z
        .boolean()
        .optional()
        .describe('Send credentials with the first request instead of waiting for a challenge'),
    },
    {
      ...DISCOVERY_TOOL_ANNOTATIONS,
      title: 'Discover DAV Services',
    },
    async ({ uri, username, password, preemptiveAuth }) => {
      logger.debug({ uri }, 'discover_dav_services called');

      try {
        const configuration = await discover(
          uri,
          {
            userName: username ?? config.DAV_USERNAME,
            password: password ?? config.DAV_PASSWORD,
            preemptiveAuth: preemptiveAuth ?? config.DAV_PREEMPTIVE_AUTH,
          },
          {
            logger,
            requestTimeout: config.DAV_REQUEST_TIMEOUT,
            dnsTimeout: config.DAV_DNS_TIMEOUT,
          }
        );

        logger.debug(
          {
            uri,
            calendar: configuration.calendarService !== null,
            contacts: configuration.contactsService !== null,
          },
          'discover_dav_services success'
        );

        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify(transformConfiguration(configuration), null, 2),
            },
          ],
        };
      } catch (error) {
        logger.error({ error, uri }, 'discover_dav_services failed');
        const message =
          error instanceof DavError
            ? `${error.message}\nFix: ${error.fix}`
            : error instanceof Error
              ? error.message
              : String(error);
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error discovering services: ${message}`,
            },
          ],
          isError: true,
        };
      }
    }
  );
}
