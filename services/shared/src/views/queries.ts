import type { UnitOfWork } from '../unit-of-work/unit-of-work';
import type { AllocationSummary } from '../types/allocation.types';

/**
 * Allocations currently held by an order, read straight from the projection.
 * Unknown orders and orders with nothing allocated both give an empty list.
 */
export async function allocationsForOrder(
     orderId: string,
     uow: UnitOfWork
): Promise<AllocationSummary[]> {
     return uow.withTransaction(({ allocationsView }) => allocationsView.findByOrder(orderId));
}

/** True once any allocation has ever been projected for the order. */
export async function isKnownOrder(orderId: string, uow: UnitOfWork): Promise<boolean> {
     return uow.withTransaction(({ allocationsView }) => allocationsView.hasOrder(orderId));
}
