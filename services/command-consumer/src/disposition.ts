import { ConcurrencyError, DomainError, TransportError } from '@allocation/shared/src/utils/errors';

export type Disposition = 'requeue' | 'dead-letter';

/** Whether a failed message is worth another delivery or belongs in the DLQ. */
export function dispositionFor(error: unknown): Disposition {
     // A lost optimistic-lock race succeeds on retry
     if (error instanceof ConcurrencyError) {
          return 'requeue';
     }
     if (error instanceof DomainError) {
          return 'dead-letter';
     }
     if (error instanceof TransportError) {
          return error.retriable ? 'requeue' : 'dead-letter';
     }
     // Unknown error - send to DLQ
     return 'dead-letter';
}
