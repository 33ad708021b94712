/**
 * Commands express an intent to change state. Each command type has exactly
 * one handler, and a failing handler fails the caller of `MessageBus.handle`.
 */

export interface CreateBatch {
     readonly kind: 'command';
     readonly type: 'CreateBatch';
     readonly reference: string;
     readonly sku: string;
     readonly quantity: number;
     /** ISO date (YYYY-MM-DD) of expected arrival; null for stock already in the warehouse. */
     readonly eta: string | null;
}

export interface Allocate {
     readonly kind: 'command';
     readonly type: 'Allocate';
     readonly orderId: string;
     readonly sku: string;
     readonly quantity: number;
}

export interface Deallocate {
     readonly kind: 'command';
     readonly type: 'Deallocate';
     readonly orderId: string;
     readonly sku: string;
     readonly quantity: number;
}

export interface ChangeBatchQuantity {
     readonly kind: 'command';
     readonly type: 'ChangeBatchQuantity';
     readonly reference: string;
     readonly quantity: number;
}

export type Command = CreateBatch | Allocate | Deallocate | ChangeBatchQuantity;

export type CommandType = Command['type'];

export type CommandOf<T extends CommandType> = Extract<Command, { type: T }>;

export function createBatch(fields: {
     reference: string;
     sku: string;
     quantity: number;
     eta?: string | null;
}): CreateBatch {
     const command: CreateBatch = {
          kind: 'command',
          type: 'CreateBatch',
          reference: fields.reference,
          sku: fields.sku,
          quantity: fields.quantity,
          eta: fields.eta ?? null,
     };
     return Object.freeze(command);
}

export function allocate(fields: { orderId: string; sku: string; quantity: number }): Allocate {
     const command: Allocate = { kind: 'command', type: 'Allocate', ...fields };
     return Object.freeze(command);
}

export function deallocate(fields: {
     orderId: string;
     sku: string;
     quantity: number;
}): Deallocate {
     const command: Deallocate = { kind: 'command', type: 'Deallocate', ...fields };
     return Object.freeze(command);
}

export function changeBatchQuantity(fields: {
     reference: string;
     quantity: number;
}): ChangeBatchQuantity {
     const command: ChangeBatchQuantity = {
          kind: 'command',
          type: 'ChangeBatchQuantity',
          ...fields,
     };
     return Object.freeze(command);
}
