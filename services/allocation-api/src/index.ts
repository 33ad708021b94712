// Load environment variables before any module reads them
import 'dotenv/config';
import { bootstrap } from '@allocation/shared/src/bootstrap';
import { getApiAddress } from '@allocation/shared/src/config';
import { closePool } from '@allocation/shared/src/db/client';
import { closeConnection } from '@allocation/shared/src/messaging/client';
import { logger } from '@allocation/shared/src/utils/logger';
import { buildApp } from './app';

async function main() {
     const { host, port } = getApiAddress();
     const bus = bootstrap();
     const app = await buildApp({ bus, logger: true, docs: true });

     // Start server
     try {
          await app.listen({ port, host });
          logger.info(`Allocation API listening on ${host}:${port}`);
          logger.info(`OpenAPI docs available at http://${host}:${port}/docs`);
     } catch (err) {
          logger.error({ err }, 'Failed to start server');
          process.exit(1);
     }

     // Graceful shutdown
     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await app.close();
          await closeConnection();
          await closePool();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error in allocation API');
     process.exit(1);
});
