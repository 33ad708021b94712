import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { MessageBus } from '@allocation/shared/src/services/message-bus';
import { checkConnection } from '@allocation/shared/src/db/client';
import { registerAllocationRoutes } from './routes/allocation';

export interface BuildAppOptions {
     bus: MessageBus;
     logger?: FastifyServerOptions['logger'];
     /** Serve the OpenAPI document and UI under /docs. */
     docs?: boolean;
     /** Readiness probe; defaults to a database ping. */
     checkReady?: () => Promise<boolean>;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
     const app = Fastify({
          logger: options.logger ?? false,
          requestIdHeader: 'x-correlation-id',
          genReqId: (req) => {
               const header = req.headers['x-correlation-id'];
               return typeof header === 'string' ? header : `req-${Date.now()}`;
          },
          ajv: {
               customOptions: {
                    removeAdditional: 'all',
                    coerceTypes: true,
                    useDefaults: true,
                    strict: false,
               },
          },
     });

     // CORS
     await app.register(cors, {
          origin: true,
     });

     if (options.docs) {
          // OpenAPI/Swagger
          await app.register(swagger, {
               openapi: {
                    info: {
                         title: 'Allocation API',
                         description: 'Allocates order lines to stock batches',
                         version: '1.0.0',
                    },
                    servers: [{ url: 'http://localhost:3000', description: 'Development' }],
                    tags: [
                         { name: 'batches', description: 'Stock batches' },
                         { name: 'allocations', description: 'Order line allocation and lookup' },
                         { name: 'health', description: 'Health and readiness checks' },
                    ],
               },
          });

          await app.register(swaggerUi, {
               routePrefix: '/docs',
               uiConfig: {
                    docExpansion: 'list',
                    deepLinking: true,
               },
          });
     }

     const checkReady = options.checkReady ?? checkConnection;

     // Health checks
     app.get(
          '/health',
          {
               schema: {
                    tags: ['health'],
                    description: 'Basic health check',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ok' },
                                   timestamp: { type: 'string', format: 'date-time' },
                              },
                         },
                    },
               },
          },
          async () => {
               return {
                    status: 'ok',
                    timestamp: new Date().toISOString(),
               };
          }
     );

     app.get(
          '/health/ready',
          {
               schema: {
                    tags: ['health'],
                    description: 'Readiness check with dependency validation',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ready' },
                                   dependencies: {
                                        type: 'object',
                                        properties: {
                                             database: { type: 'string' },
                                        },
                                   },
                              },
                         },
                         503: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string' },
                                   error: { type: 'string' },
                              },
                         },
                    },
               },
          },
          async (_request, reply) => {
               try {
                    if (!(await checkReady())) {
                         reply.code(503);
                         return {
                              status: 'not_ready',
                              error: 'Database connection failed',
                         };
                    }

                    return {
                         status: 'ready',
                         dependencies: {
                              database: 'ok',
                         },
                    };
               } catch (error) {
                    reply.code(503);
                    return {
                         status: 'not_ready',
                         error: error instanceof Error ? error.message : 'Unknown error',
                    };
               }
          }
     );

     await app.register(registerAllocationRoutes, { bus: options.bus });

     return app;
}
