import type { Allocated, Deallocated, Event } from '../messages';
import type { AllocationsViewStore, UnitOfWork } from '../unit-of-work/unit-of-work';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger({ component: 'allocations-view' });

/** Applies one event to the allocations projection. Other event types are ignored. */
export async function applyToAllocationsView(
     view: AllocationsViewStore,
     event: Event
): Promise<void> {
     switch (event.type) {
          case 'Allocated':
               await view.insert({
                    orderId: event.orderId,
                    sku: event.sku,
                    batchReference: event.batchReference,
               });
               break;
          case 'Deallocated':
               await view.remove(event.orderId, event.sku);
               break;
          default:
               break;
     }
}

export function isProjected(event: Event): event is Allocated | Deallocated {
     return event.type === 'Allocated' || event.type === 'Deallocated';
}

/**
 * Empties the projection and replays `history` (oldest first) into it in one
 * transaction. This is the repair path after the view has fallen behind.
 */
export async function rebuildAllocationsView(
     uow: UnitOfWork,
     history: Iterable<Event>
): Promise<number> {
     const replayed = await uow.withTransaction(async ({ allocationsView }) => {
          await allocationsView.clear();
          let count = 0;
          for (const event of history) {
               if (isProjected(event)) {
                    await applyToAllocationsView(allocationsView, event);
                    count += 1;
               }
          }
          return count;
     });

     log.info({ replayed }, 'Allocations view rebuilt');
     return replayed;
}
