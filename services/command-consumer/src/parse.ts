import { changeBatchQuantity, ChangeBatchQuantity } from '@allocation/shared/src/messages';

export class InvalidPayloadError extends Error {
     constructor(message: string) {
          super(message);
          this.name = 'InvalidPayloadError';
     }
}

/**
 * Turns an inbound `{ reference, quantity }` JSON message into a command.
 * Both snake_case `batchref`/`qty` and camelCase field names are accepted.
 */
export function parseChangeBatchQuantity(content: Buffer | string): ChangeBatchQuantity {
     let payload: unknown;
     try {
          payload = JSON.parse(content.toString());
     } catch {
          throw new InvalidPayloadError('Message body is not valid JSON');
     }

     if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
          throw new InvalidPayloadError('Message body must be a JSON object');
     }

     const fields = new Map<string, unknown>(Object.entries(payload));
     const reference = fields.get('reference') ?? fields.get('batchref');
     const quantity = fields.get('quantity') ?? fields.get('qty');

     if (typeof reference !== 'string' || reference.length === 0) {
          throw new InvalidPayloadError('reference must be a non-empty string');
     }
     if (typeof quantity !== 'number' || !Number.isInteger(quantity) || quantity < 0) {
          throw new InvalidPayloadError('quantity must be a non-negative integer');
     }

     return changeBatchQuantity({ reference, quantity });
}
