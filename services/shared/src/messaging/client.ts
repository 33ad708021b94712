import * as amqplib from 'amqplib';
import type { Channel, ConsumeMessage } from 'amqplib';
import { v4 as uuidv4 } from 'uuid';
import { getAmqpUrl } from '../config';
import { toJournalPayload, Event } from '../messages';
import { logger } from '../utils/logger';

type AmqpConnection = Awaited<ReturnType<typeof amqplib.connect>>;

let connection: AmqpConnection | null = null;
let channel: Channel | null = null;

export const ALLOCATION_EVENTS_EXCHANGE = 'allocation.events';
export const ALLOCATION_COMMANDS_EXCHANGE = 'allocation.commands';
export const CHANGE_BATCH_QUANTITY_QUEUE = 'allocation.change_batch_quantity';
export const DEAD_LETTER_EXCHANGE = 'dlx.allocation';

async function connect(): Promise<AmqpConnection> {
     const url = getAmqpUrl();
     logger.info({ url: url.replace(/:[^:]*@/, ':****@') }, 'Connecting to RabbitMQ');

     const conn = await amqplib.connect(url);

     conn.on('error', (err) => {
          logger.error({ err }, 'RabbitMQ connection error');
     });

     conn.on('close', () => {
          logger.warn('RabbitMQ connection closed, will reconnect on next use');
          connection = null;
          channel = null;
     });

     logger.info('Connected to RabbitMQ');
     return conn;
}

export async function getChannel(): Promise<Channel> {
     if (channel) return channel;

     if (!connection) {
          connection = await connect();
     }

     const ch = await connection.createChannel();

     // Setup exchanges
     await ch.assertExchange(ALLOCATION_EVENTS_EXCHANGE, 'topic', { durable: true });
     await ch.assertExchange(ALLOCATION_COMMANDS_EXCHANGE, 'topic', { durable: true });

     // Setup dead letter exchange
     await ch.assertExchange(DEAD_LETTER_EXCHANGE, 'topic', { durable: true });

     // Setup queues
     await ch.assertQueue(CHANGE_BATCH_QUANTITY_QUEUE, {
          durable: true,
          deadLetterExchange: DEAD_LETTER_EXCHANGE,
          deadLetterRoutingKey: `dlq.${CHANGE_BATCH_QUANTITY_QUEUE}`,
     });
     await ch.assertQueue(`dlq.${CHANGE_BATCH_QUANTITY_QUEUE}`, { durable: true });

     // Bind queues to exchanges
     await ch.bindQueue(
          CHANGE_BATCH_QUANTITY_QUEUE,
          ALLOCATION_COMMANDS_EXCHANGE,
          'allocation.ChangeBatchQuantity'
     );
     await ch.bindQueue(
          `dlq.${CHANGE_BATCH_QUANTITY_QUEUE}`,
          DEAD_LETTER_EXCHANGE,
          `dlq.${CHANGE_BATCH_QUANTITY_QUEUE}`
     );

     logger.info('RabbitMQ channel created and configured');

     channel = ch;
     return ch;
}

/**
 * Production publish transport: one persistent message per event on the
 * events exchange, routed by topic. Delivery is at-least-once.
 */
export async function publishEvent(topic: string, event: Event): Promise<void> {
     const ch = await getChannel();
     const content = Buffer.from(JSON.stringify(toJournalPayload(event)));

     ch.publish(ALLOCATION_EVENTS_EXCHANGE, topic, content, {
          persistent: true,
          contentType: 'application/json',
          type: event.type,
          messageId: uuidv4(),
          timestamp: Date.now(),
     });

     logger.debug({ topic, type: event.type }, 'Event published');
}

export async function closeConnection(): Promise<void> {
     if (channel) {
          await channel.close();
          channel = null;
     }
     if (connection) {
          await connection.close();
          connection = null;
     }
     logger.info('RabbitMQ connection closed');
}

export type { ConsumeMessage };
