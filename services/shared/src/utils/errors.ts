// Custom error classes for domain-specific errors

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

export class InvalidSkuError extends DomainError {
     constructor(public readonly sku: string) {
          super(`Invalid sku ${sku}`, 'INVALID_SKU', 400);
     }
}

export class OutOfStockError extends DomainError {
     constructor(
          public readonly sku: string,
          public readonly requested: number
     ) {
          super(`Out of stock for sku ${sku}: requested ${requested}`, 'OUT_OF_STOCK', 409);
     }
}

export class BatchNotFoundError extends DomainError {
     constructor(public readonly reference: string) {
          super(`Batch ${reference} not found`, 'BATCH_NOT_FOUND', 404);
     }
}

export class DuplicateBatchError extends DomainError {
     constructor(public readonly reference: string) {
          super(`Batch ${reference} already exists`, 'DUPLICATE_BATCH', 409);
     }
}

export class AllocationNotFoundError extends DomainError {
     constructor(
          public readonly orderId: string,
          public readonly sku: string
     ) {
          super(
               `Order ${orderId} has no allocation for sku ${sku}`,
               'ALLOCATION_NOT_FOUND',
               404
          );
     }
}

export class DuplicateAllocationError extends DomainError {
     constructor(
          public readonly orderId: string,
          public readonly sku: string
     ) {
          super(
               `Order ${orderId} is already allocated for sku ${sku}`,
               'ALREADY_ALLOCATED',
               409
          );
     }
}

export class InvalidQuantityError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_QUANTITY', 400);
     }
}

export class ConcurrencyError extends DomainError {
     constructor(public readonly sku: string) {
          super(`Product ${sku} was modified concurrently`, 'CONCURRENT_MODIFICATION', 409);
     }
}

export class OrderNotFoundError extends DomainError {
     constructor(public readonly orderId: string) {
          super(`Order ${orderId} not found`, 'ORDER_NOT_FOUND', 404);
     }
}

// Runtime wiring errors. These are programming or configuration faults, not business rules.

export class MissingDependencyError extends Error {
     constructor(
          public readonly handler: string,
          public readonly missing: readonly string[]
     ) {
          super(`Handler ${handler} is missing dependencies: ${missing.join(', ')}`);
          this.name = 'MissingDependencyError';
     }
}

export class NoCommandHandlerError extends Error {
     constructor(public readonly commandType: string) {
          super(`No handler registered for command ${commandType}`);
          this.name = 'NoCommandHandlerError';
     }
}

export class UnrecognizedBootstrapOptionError extends Error {
     constructor(public readonly options: readonly string[]) {
          super(`Unrecognized bootstrap options: ${options.join(', ')}`);
          this.name = 'UnrecognizedBootstrapOptionError';
     }
}

export class MessageLimitExceededError extends Error {
     constructor(
          public readonly limit: number,
          public readonly messageType: string
     ) {
          super(
               `Message bus processed more than ${limit} messages in one call (last: ${messageType}); possible handler cycle`
          );
          this.name = 'MessageLimitExceededError';
     }
}

export class TransportError extends Error {
     constructor(
          public readonly statusCode: number,
          message: string,
          public readonly retriable: boolean = false
     ) {
          super(message);
          this.name = 'TransportError';

          // 429, 503, 504 are retriable
          if ([429, 503, 504].includes(statusCode)) {
               this.retriable = true;
          }
     }
}
