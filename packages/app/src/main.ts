#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { bootstrap } from './bootstrap.js';

async function main(): Promise<void> {
  const app = await bootstrap();
  const transport = new StdioServerTransport();
  await app.server.connect(transport);

  // Handle shutdown signals
  const handleShutdown = () => {
    app.logger.info('Shutting down...');
    app.server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.logger.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', handleShutdown);
  process.on('SIGTERM', handleShutdown);

  app.logger.info(`${app.config.server.name} ${app.config.server.version} serving on stdio`);
}

main().catch((err) => {
  console.error('Fatal:', err instanceof Error ? err.message : err);
  process.exit(1);
});
