import 'dotenv/config';
import { bootstrap } from '@allocation/shared/src/bootstrap';
import { closePool } from '@allocation/shared/src/db/client';
import { closeConnection } from '@allocation/shared/src/messaging/client';
import { logger } from '@allocation/shared/src/utils/logger';
import { CommandConsumer } from './consumer';

async function main() {
     const consumer = new CommandConsumer(bootstrap());

     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await closeConnection();
          await closePool();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);

     await consumer.start();
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error in command consumer');
     process.exit(1);
});
