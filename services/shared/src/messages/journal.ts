import { allocated, deallocated, outOfStock, Event } from './events';

type Payload = Record<string, unknown>;

function isPayload(value: unknown): value is Payload {
     return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(payload: Payload, key: string): string | undefined {
     const value = payload[key];
     return typeof value === 'string' ? value : undefined;
}

function int(payload: Payload, key: string): number | undefined {
     const value = payload[key];
     return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
}

/** Journal payload for an event: its fields without the discriminants. */
export function toJournalPayload(event: Event): Payload {
     const { kind: _kind, type: _type, ...fields } = event;
     return fields;
}

/** Rebuilds an event from a journal row; undefined when the row is not a known, well-formed event. */
export function eventFromJournal(type: string, payload: unknown): Event | undefined {
     if (!isPayload(payload)) {
          return undefined;
     }

     const orderId = str(payload, 'orderId');
     const sku = str(payload, 'sku');
     const quantity = int(payload, 'quantity');

     switch (type) {
          case 'Allocated': {
               const batchReference = str(payload, 'batchReference');
               if (
                    orderId === undefined ||
                    sku === undefined ||
                    quantity === undefined ||
                    batchReference === undefined
               ) {
                    return undefined;
               }
               return allocated({ orderId, sku, quantity, batchReference });
          }
          case 'Deallocated':
               if (orderId === undefined || sku === undefined || quantity === undefined) {
                    return undefined;
               }
               return deallocated({ orderId, sku, quantity });
          case 'OutOfStock':
               return sku === undefined ? undefined : outOfStock({ sku });
          default:
               return undefined;
     }
}
