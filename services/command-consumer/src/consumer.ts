import type { Channel } from 'amqplib';
import { getAmqpPrefetch } from '@allocation/shared/src/config';
import {
     getChannel,
     CHANGE_BATCH_QUANTITY_QUEUE,
     ConsumeMessage,
} from '@allocation/shared/src/messaging/client';
import type { MessageBus } from '@allocation/shared/src/services/message-bus';
import { logger } from '@allocation/shared/src/utils/logger';
import { dispositionFor } from './disposition';
import { parseChangeBatchQuantity } from './parse';

export type Settler = Pick<Channel, 'ack' | 'nack'>;

export class CommandConsumer {
     constructor(private readonly bus: MessageBus) {}

     async start() {
          const prefetch = getAmqpPrefetch();
          logger.info({ prefetch }, 'Starting command consumer');

          const channel = await getChannel();
          await channel.prefetch(prefetch);

          await channel.consume(CHANGE_BATCH_QUANTITY_QUEUE, (msg) => {
               if (!msg) return;
               this.process(channel, msg).catch((err) => {
                    logger.error({ err }, 'Failed to settle message');
               });
          });

          logger.info('Command consumer started');
     }

     async process(channel: Settler, msg: ConsumeMessage): Promise<void> {
          try {
               const command = parseChangeBatchQuantity(msg.content);
               logger.info(
                    { reference: command.reference, quantity: command.quantity },
                    'Handling ChangeBatchQuantity'
               );
               await this.bus.handle(command);
               channel.ack(msg);
          } catch (error) {
               const disposition = dispositionFor(error);
               logger[disposition === 'requeue' ? 'warn' : 'error'](
                    { err: error, disposition },
                    'Command failed'
               );
               channel.nack(msg, false, disposition === 'requeue');
          }
     }
}
