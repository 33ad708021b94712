import { createEmailClient } from './clients/email-client';
import { getMaxMessagesPerHandle } from './config';
import { pool } from './db/client';
import { startMappers } from './db/mappers';
import type { Command, Event } from './messages';
import { publishEvent } from './messaging/client';
import { COMMAND_HANDLERS, EVENT_HANDLERS } from './services/handlers';
import { BoundHandler, Dependencies, HandlerDefinition, inject } from './services/injector';
import { MessageBus } from './services/message-bus';
import type { Publish, SendMail } from './types/allocation.types';
import { PgUnitOfWork } from './unit-of-work/pg-unit-of-work';
import type { UnitOfWork } from './unit-of-work/unit-of-work';
import { MissingDependencyError, UnrecognizedBootstrapOptionError } from './utils/errors';
import { createChildLogger } from './utils/logger';

const log = createChildLogger({ component: 'bootstrap' });

export interface BootstrapOptions {
     /** Install the persistence mappers. Defaults to true. */
     startMappers?: boolean;
     uow?: UnitOfWork;
     sendMail?: SendMail;
     publish?: Publish;
}

const RECOGNIZED_OPTIONS = new Set<string>(['startMappers', 'uow', 'sendMail', 'publish']);

function assertBound<M>(handler: BoundHandler<M>): BoundHandler<M> {
     if (handler.missing.length > 0) {
          throw new MissingDependencyError(handler.handlerName, handler.missing);
     }
     return handler;
}

/**
 * Composition root. Resolves every collaborator (production defaults for any
 * option left out), binds all registered handlers to them and returns the bus.
 */
export function bootstrap(options: BootstrapOptions = {}): MessageBus {
     const unrecognized = Object.keys(options).filter((key) => !RECOGNIZED_OPTIONS.has(key));
     if (unrecognized.length > 0) {
          throw new UnrecognizedBootstrapOptionError(unrecognized);
     }

     if (options.startMappers ?? true) {
          startMappers();
     }

     const dependencies: Dependencies = {
          uow: options.uow ?? new PgUnitOfWork(pool),
          sendMail: options.sendMail ?? createEmailClient().send,
          publish: options.publish ?? publishEvent,
     };

     const commandDefinitions: Array<[string, HandlerDefinition<Command>]> =
          Object.entries(COMMAND_HANDLERS);
     const commandHandlers = new Map<string, BoundHandler<Command>>();
     for (const [type, definition] of commandDefinitions) {
          commandHandlers.set(type, assertBound(inject(definition, dependencies)));
     }

     const eventDefinitions: Array<[string, ReadonlyArray<HandlerDefinition<Event>>]> =
          Object.entries(EVENT_HANDLERS);
     const eventHandlers = new Map<string, ReadonlyArray<BoundHandler<Event>>>();
     for (const [type, definitions] of eventDefinitions) {
          eventHandlers.set(
               type,
               definitions.map((definition) => assertBound(inject(definition, dependencies)))
          );
     }

     log.debug(
          { commands: [...commandHandlers.keys()], events: [...eventHandlers.keys()] },
          'Message bus assembled'
     );

     return new MessageBus(dependencies.uow, commandHandlers, eventHandlers, {
          maxMessages: getMaxMessagesPerHandle(),
     });
}
