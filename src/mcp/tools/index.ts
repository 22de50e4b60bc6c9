/**
 * Tool registration aggregator.
 * Centralizes all MCP tool registrations.
 */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Config } from '../../config/schema.js';
import type { Logger } from '../../config/logger.js';
import { registerDiscoveryTools } from './discovery.js';

/**
 * Register all MCP tools with the server.
 * @param server MCP server instance
 * @param config Environment configuration
 * @param logger Pino logger
 */
export function registerAllTools(server: McpServer, config: Config, logger: Logger): void {
  logger.debug('Registering MCP tools...');

  // Register discovery tools (discover_dav_services)
  registerDiscoveryTools(server, config, logger);

  logger.info('All MCP tools registered');
}
