/**
 * Events record facts that already happened. An event type may have any number
 * of handlers; each handler failure is isolated from its siblings.
 */

export interface Allocated {
     readonly kind: 'event';
     readonly type: 'Allocated';
     readonly orderId: string;
     readonly sku: string;
     readonly quantity: number;
     readonly batchReference: string;
}

export interface Deallocated {
     readonly kind: 'event';
     readonly type: 'Deallocated';
     readonly orderId: string;
     readonly sku: string;
     readonly quantity: number;
}

export interface OutOfStock {
     readonly kind: 'event';
     readonly type: 'OutOfStock';
     readonly sku: string;
}

export type Event = Allocated | Deallocated | OutOfStock;

export type EventType = Event['type'];

export type EventOf<T extends EventType> = Extract<Event, { type: T }>;

export function allocated(fields: {
     orderId: string;
     sku: string;
     quantity: number;
     batchReference: string;
}): Allocated {
     const event: Allocated = { kind: 'event', type: 'Allocated', ...fields };
     return Object.freeze(event);
}

export function deallocated(fields: {
     orderId: string;
     sku: string;
     quantity: number;
}): Deallocated {
     const event: Deallocated = { kind: 'event', type: 'Deallocated', ...fields };
     return Object.freeze(event);
}

export function outOfStock(fields: { sku: string }): OutOfStock {
     const event: OutOfStock = { kind: 'event', type: 'OutOfStock', ...fields };
     return Object.freeze(event);
}
