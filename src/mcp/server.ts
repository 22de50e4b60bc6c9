/**
 * MCP server for CalDAV/CardDAV service discovery.
 * Uses stdio transport for AI assistant communication.
 */
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig, type Config } from '../config/schema.js';
import { createLogger, type Logger } from '../config/logger.js';
import { formatStartupError } from '../errors.js';
import { VERSION } from '../version.js';
import { registerAllTools } from './tools/index.js';

/** Server name for MCP identification */
const SERVER_NAME = 'dav-discovery';

/**
 * Create MCP server instance with all tools registered.
 * @param config Validated configuration
 * @param logger Pino logger (stderr only)
 */
export function createMCPServer(config: Config, logger: Logger): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: VERSION,
  });

  registerAllTools(server, config, logger);

  return server;
}

/**
 * Start the MCP server.
 * Exits with code 1 on startup failure.
 */
export async function startServer(): Promise<void> {
  let logger: Logger | undefined;

  try {
    // Step 1: Load and validate configuration
    const config = loadConfig();

    // Step 2: Initialize logger (stderr only - stdout reserved for MCP)
    logger = createLogger(config.LOG_LEVEL);
    logger.info({ version: VERSION }, 'Starting dav-discovery server');

    // Step 3: Create MCP server and register tools
    const server = createMCPServer(config, logger);

    // Step 4: Connect MCP server via stdio transport
    const transport = new StdioServerTransport();
    await server.connect(transport);

    logger.info('MCP server running on stdio');
  } catch (error) {
    const errorMessage = formatStartupError(error instanceof Error ? error : new Error(String(error)));

    // Log to stderr (NEVER stdout - reserved for MCP JSON-RPC)
    if (logger) {
      logger.fatal({ error }, 'Startup failed');
    }
    process.stderr.write(`\n${errorMessage}\n`);
    process.exit(1);
  }
}
