#!/usr/bin/env node

/**
 * Search Job Lifecycle MCP Server - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { McpServer } from './presentation/McpServer.js';

async function main() {
  let mcpServer: McpServer | null = null;

  try {
    const config = getConfig();
    printConfigInfo(config);

    mcpServer = new McpServer(config);
    await mcpServer.start();

    const shutdown = async (signal: string) => {
      console.error(`\n\n📛 Received ${signal}, shutting down gracefully...`);

      if (mcpServer) {
        await mcpServer.shutdown();
      }

      console.error('👋 Goodbye!\n');
      process.exit(0);
    };

    process.on('SIGINT', () => {
      void shutdown('SIGINT');
    });
    process.on('SIGTERM', () => {
      void shutdown('SIGTERM');
    });

    process.on('uncaughtException', async (error) => {
      console.error('💥 Uncaught Exception:', error);
      await shutdown('UNCAUGHT_EXCEPTION');
    });

    process.on('unhandledRejection', async (reason, promise) => {
      console.error('💥 Unhandled Rejection at:', promise, 'reason:', reason);
      await shutdown('UNHANDLED_REJECTION');
    });
  } catch (error) {
    console.error('💥 Fatal error in main():', error);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('💥 Fatal error:', error);
  process.exit(1);
});
