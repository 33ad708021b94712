const errorResponse = (description: string, code: string, message: string) => ({
     description,
     type: 'object',
     properties: {
          error: { type: 'string', example: code },
          message: { type: 'string', example: message },
     },
});

const acceptedResponse = {
     description: 'Command accepted; read the allocations view for the outcome',
     type: 'object',
     properties: {
          status: { type: 'string', example: 'accepted' },
          orderId: { type: 'string', example: 'order-1' },
     },
};

const orderLineBody = {
     type: 'object',
     required: ['orderId', 'sku', 'quantity'],
     properties: {
          orderId: {
               type: 'string',
               description: 'Order identifier',
               minLength: 1,
               example: 'order-1',
          },
          sku: {
               type: 'string',
               description: 'Product sku',
               minLength: 1,
               example: 'CHAIR',
          },
          quantity: {
               type: 'integer',
               description: 'Units to allocate',
               minimum: 1,
               example: 2,
          },
     },
};

export const createBatchSchema = {
     tags: ['batches'],
     summary: 'Add a batch of stock',
     body: {
          type: 'object',
          required: ['reference', 'sku', 'quantity'],
          properties: {
               reference: { type: 'string', minLength: 1, example: 'batch-001' },
               sku: { type: 'string', minLength: 1, example: 'CHAIR' },
               quantity: { type: 'integer', minimum: 0, example: 10 },
               eta: {
                    type: ['string', 'null'],
                    format: 'date',
                    description: 'Expected arrival; omit or null for stock on hand',
                    example: '2026-11-01',
               },
          },
     },
     response: {
          201: {
               description: 'Batch created',
               type: 'object',
               properties: {
                    status: { type: 'string', example: 'ok' },
                    reference: { type: 'string', example: 'batch-001' },
               },
          },
          400: errorResponse('Invalid request', 'INVALID_QUANTITY', 'Quantity must not be negative'),
          409: errorResponse('Duplicate batch', 'DUPLICATE_BATCH', 'Batch batch-001 already exists'),
          500: errorResponse('Internal server error', 'INTERNAL_ERROR', 'An unexpected error occurred'),
     },
};

export const allocateSchema = {
     tags: ['allocations'],
     summary: 'Allocate an order line to a batch',
     description:
          'Accepts the allocation and returns immediately. Fetch GET /allocations/:orderId to see which batch was chosen.',
     body: orderLineBody,
     response: {
          202: acceptedResponse,
          400: errorResponse('Unknown sku', 'INVALID_SKU', 'Invalid sku CHAIR'),
          409: errorResponse('Out of stock', 'OUT_OF_STOCK', 'Out of stock for sku CHAIR: requested 2'),
          500: errorResponse('Internal server error', 'INTERNAL_ERROR', 'An unexpected error occurred'),
     },
};

export const deallocateSchema = {
     tags: ['allocations'],
     summary: 'Release an order line',
     body: orderLineBody,
     response: {
          202: acceptedResponse,
          400: errorResponse('Unknown sku', 'INVALID_SKU', 'Invalid sku CHAIR'),
          404: errorResponse(
               'Nothing allocated',
               'ALLOCATION_NOT_FOUND',
               'Order order-1 has no allocation for sku CHAIR'
          ),
          500: errorResponse('Internal server error', 'INTERNAL_ERROR', 'An unexpected error occurred'),
     },
};

export const changeBatchQuantitySchema = {
     tags: ['batches'],
     summary: 'Change the purchased quantity of a batch',
     params: {
          type: 'object',
          required: ['reference'],
          properties: {
               reference: { type: 'string', example: 'batch-001' },
          },
     },
     body: {
          type: 'object',
          required: ['quantity'],
          properties: {
               quantity: { type: 'integer', minimum: 0, example: 5 },
          },
     },
     response: {
          202: {
               description: 'Change accepted',
               type: 'object',
               properties: {
                    status: { type: 'string', example: 'accepted' },
                    reference: { type: 'string', example: 'batch-001' },
               },
          },
          404: errorResponse('Unknown batch', 'BATCH_NOT_FOUND', 'Batch batch-001 not found'),
          500: errorResponse('Internal server error', 'INTERNAL_ERROR', 'An unexpected error occurred'),
     },
};

export const getAllocationsSchema = {
     tags: ['allocations'],
     summary: 'Current allocations for an order',
     params: {
          type: 'object',
          required: ['orderId'],
          properties: {
               orderId: { type: 'string', example: 'order-1' },
          },
     },
     response: {
          200: {
               description: 'Allocations held by the order (possibly none)',
               type: 'array',
               items: {
                    type: 'object',
                    properties: {
                         sku: { type: 'string', example: 'CHAIR' },
                         batchReference: { type: 'string', example: 'batch-001' },
                    },
               },
          },
          404: errorResponse('Unknown order', 'ORDER_NOT_FOUND', 'Order order-1 not found'),
          500: errorResponse('Internal server error', 'INTERNAL_ERROR', 'An unexpected error occurred'),
     },
};
