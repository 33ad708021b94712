import { getOutOfStockRecipient } from '../config';
import { Batch, Product } from '../domain/model';
import type {
     Allocate,
     Allocated,
     ChangeBatchQuantity,
     CommandOf,
     CommandType,
     CreateBatch,
     Deallocate,
     Deallocated,
     EventOf,
     EventType,
     OutOfStock,
} from '../messages';
import { applyToAllocationsView } from '../views/projection';
import { BatchNotFoundError, DuplicateBatchError, InvalidSkuError } from '../utils/errors';
import { logger } from '../utils/logger';
import { defineHandler, HandlerDefinition } from './injector';

// Command handlers

export const addBatch = defineHandler(
     'addBatch',
     ['uow'],
     async (command: CreateBatch, { uow }) => {
          await uow.withTransaction(async ({ products }) => {
               // Batch references are unique across every sku
               if (await products.getByBatchReference(command.reference)) {
                    throw new DuplicateBatchError(command.reference);
               }
               let product = await products.get(command.sku);
               if (!product) {
                    product = new Product(command.sku);
                    await products.add(product);
               }
               product.addBatch(
                    new Batch(command.reference, command.sku, command.quantity, command.eta)
               );
          });
          logger.info({ reference: command.reference, sku: command.sku }, 'Batch added');
     }
);

export const allocate = defineHandler(
     'allocate',
     ['uow'],
     async (command: Allocate, { uow }) => {
          const batchReference = await uow.withTransaction(async ({ products }) => {
               const product = await products.get(command.sku);
               if (!product) {
                    throw new InvalidSkuError(command.sku);
               }
               return product.allocate({
                    orderId: command.orderId,
                    sku: command.sku,
                    quantity: command.quantity,
               });
          });
          logger.info({ orderId: command.orderId, sku: command.sku, batchReference }, 'Allocated');
     }
);

export const deallocate = defineHandler(
     'deallocate',
     ['uow'],
     async (command: Deallocate, { uow }) => {
          await uow.withTransaction(async ({ products }) => {
               const product = await products.get(command.sku);
               if (!product) {
                    throw new InvalidSkuError(command.sku);
               }
               product.deallocate({
                    orderId: command.orderId,
                    sku: command.sku,
                    quantity: command.quantity,
               });
          });
          logger.info({ orderId: command.orderId, sku: command.sku }, 'Deallocated');
     }
);

export const changeBatchQuantity = defineHandler(
     'changeBatchQuantity',
     ['uow'],
     async (command: ChangeBatchQuantity, { uow }) => {
          await uow.withTransaction(async ({ products }) => {
               const product = await products.getByBatchReference(command.reference);
               if (!product) {
                    throw new BatchNotFoundError(command.reference);
               }
               product.changeBatchQuantity(command.reference, command.quantity);
          });
          logger.info(
               { reference: command.reference, quantity: command.quantity },
               'Batch quantity changed'
          );
     }
);

// Event handlers

export const publishAllocatedEvent = defineHandler(
     'publishAllocatedEvent',
     ['publish'],
     async (event: Allocated, { publish }) => {
          await publish('allocation.Allocated', event);
     }
);

export const publishDeallocatedEvent = defineHandler(
     'publishDeallocatedEvent',
     ['publish'],
     async (event: Deallocated, { publish }) => {
          await publish('allocation.Deallocated', event);
     }
);

export const addAllocationToReadModel = defineHandler(
     'addAllocationToReadModel',
     ['uow'],
     async (event: Allocated, { uow }) => {
          await uow.withTransaction(({ allocationsView }) =>
               applyToAllocationsView(allocationsView, event)
          );
     }
);

export const removeAllocationFromReadModel = defineHandler(
     'removeAllocationFromReadModel',
     ['uow'],
     async (event: Deallocated, { uow }) => {
          await uow.withTransaction(({ allocationsView }) =>
               applyToAllocationsView(allocationsView, event)
          );
     }
);

export const sendOutOfStockNotification = defineHandler(
     'sendOutOfStockNotification',
     ['sendMail'],
     async (event: OutOfStock, { sendMail }) => {
          await sendMail(getOutOfStockRecipient(), `Out of stock for ${event.sku}`);
     }
);

export type CommandHandlerRegistry = {
     readonly [T in CommandType]: HandlerDefinition<CommandOf<T>>;
};

export type EventHandlerRegistry = {
     readonly [T in EventType]: ReadonlyArray<HandlerDefinition<EventOf<T>>>;
};

export const COMMAND_HANDLERS: CommandHandlerRegistry = {
     CreateBatch: addBatch,
     Allocate: allocate,
     Deallocate: deallocate,
     ChangeBatchQuantity: changeBatchQuantity,
};

// Order within each list is the order handlers run in
export const EVENT_HANDLERS: EventHandlerRegistry = {
     Allocated: [publishAllocatedEvent, addAllocationToReadModel],
     Deallocated: [removeAllocationFromReadModel, publishDeallocatedEvent],
     OutOfStock: [sendOutOfStockNotification],
};
