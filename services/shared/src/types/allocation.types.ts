// Type definitions shared across the allocation core

import type { Event } from '../messages';

export interface OrderLine {
     orderId: string;
     sku: string;
     quantity: number;
}

/** One row of the allocations read model. Carries no reference into the write schema. */
export interface AllocationRecord {
     orderId: string;
     sku: string;
     batchReference: string;
}

/** What a reader sees for an order. */
export interface AllocationSummary {
     sku: string;
     batchReference: string;
}

/** Notification port: delivers a plain-text message to a destination address. */
export type SendMail = (destination: string, message: string) => Promise<void>;

/** Publication port: fans an event out to external subscribers under a topic. */
export type Publish = (topic: string, event: Event) => Promise<void>;

