import { FastifyInstance, FastifyReply } from 'fastify';
import {
     allocate,
     changeBatchQuantity,
     createBatch,
     deallocate,
} from '@allocation/shared/src/messages';
import type { MessageBus } from '@allocation/shared/src/services/message-bus';
import { allocationsForOrder, isKnownOrder } from '@allocation/shared/src/views/queries';
import { DomainError, OrderNotFoundError } from '@allocation/shared/src/utils/errors';
import { logger } from '@allocation/shared/src/utils/logger';
import {
     allocateSchema,
     changeBatchQuantitySchema,
     createBatchSchema,
     deallocateSchema,
     getAllocationsSchema,
} from '../schemas/allocation.schemas';

export interface AllocationRoutesOptions {
     bus: MessageBus;
}

interface OrderLineBody {
     orderId: string;
     sku: string;
     quantity: number;
}

function sendError(reply: FastifyReply, error: unknown, action: string) {
     if (error instanceof DomainError) {
          return reply.code(error.statusCode).send({
               error: error.code,
               message: error.message,
          });
     }

     logger.error({ err: error }, `Failed to ${action}`);
     return reply.code(500).send({
          error: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
     });
}

export async function registerAllocationRoutes(
     app: FastifyInstance,
     options: AllocationRoutesOptions
) {
     const { bus } = options;

     app.post<{
          Body: { reference: string; sku: string; quantity: number; eta?: string | null };
     }>('/batches', { schema: createBatchSchema }, async (request, reply) => {
          try {
               await bus.handle(createBatch(request.body));
               return reply.code(201).send({ status: 'ok', reference: request.body.reference });
          } catch (error) {
               return sendError(reply, error, 'create batch');
          }
     });

     // Commands are acknowledged with 202; the outcome is read back from the view
     app.post<{ Body: OrderLineBody }>(
          '/allocate',
          { schema: allocateSchema },
          async (request, reply) => {
               try {
                    await bus.handle(allocate(request.body));
                    return reply
                         .code(202)
                         .send({ status: 'accepted', orderId: request.body.orderId });
               } catch (error) {
                    return sendError(reply, error, 'allocate');
               }
          }
     );

     app.post<{ Body: OrderLineBody }>(
          '/deallocate',
          { schema: deallocateSchema },
          async (request, reply) => {
               try {
                    await bus.handle(deallocate(request.body));
                    return reply
                         .code(202)
                         .send({ status: 'accepted', orderId: request.body.orderId });
               } catch (error) {
                    return sendError(reply, error, 'deallocate');
               }
          }
     );

     app.post<{ Params: { reference: string }; Body: { quantity: number } }>(
          '/batches/:reference/quantity',
          { schema: changeBatchQuantitySchema },
          async (request, reply) => {
               const { reference } = request.params;
               try {
                    await bus.handle(
                         changeBatchQuantity({ reference, quantity: request.body.quantity })
                    );
                    return reply.code(202).send({ status: 'accepted', reference });
               } catch (error) {
                    return sendError(reply, error, 'change batch quantity');
               }
          }
     );

     app.get<{ Params: { orderId: string } }>(
          '/allocations/:orderId',
          { schema: getAllocationsSchema },
          async (request, reply) => {
               const { orderId } = request.params;
               try {
                    const allocations = await allocationsForOrder(orderId, bus.uow);
                    if (allocations.length === 0 && !(await isKnownOrder(orderId, bus.uow))) {
                         throw new OrderNotFoundError(orderId);
                    }
                    return reply.send(allocations);
               } catch (error) {
                    return sendError(reply, error, 'read allocations');
               }
          }
     );
}
