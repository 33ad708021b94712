// Composition root
export * from './bootstrap';

// Messages
export * from './messages';

// Domain
export * from './domain/model';

// Services
export * from './services/injector';
export * as handlers from './services/handlers';
export { COMMAND_HANDLERS, EVENT_HANDLERS } from './services/handlers';
export type { CommandHandlerRegistry, EventHandlerRegistry } from './services/handlers';
export * from './services/message-bus';

// Unit of work
export * from './unit-of-work/unit-of-work';
export * from './unit-of-work/pg-unit-of-work';

// Views
export * from './views/queries';
export * from './views/projection';

// Database
export * from './db/client';
export * from './db/mappers';

// Messaging
export * from './messaging/client';

// Clients
export * from './clients/email-client';

// Types
export * from './types/allocation.types';

// Utils
export * from './config';
export * from './utils/logger';
export * from './utils/errors';
