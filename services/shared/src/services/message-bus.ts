import type { Command, Event, Message } from '../messages';
import type { UnitOfWork } from '../unit-of-work/unit-of-work';
import { MessageLimitExceededError, NoCommandHandlerError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import type { BoundHandler } from './injector';

const log = createChildLogger({ component: 'message-bus' });

export interface MessageBusOptions {
     /** Upper bound on messages processed by one `handle` call, including the first. */
     maxMessages: number;
}

/**
 * Dispatches commands and events, and keeps going until every event raised
 * along the way has been handled. Handler tables are fixed at construction.
 */
export class MessageBus {
     constructor(
          readonly uow: UnitOfWork,
          private readonly commandHandlers: ReadonlyMap<string, BoundHandler<Command>>,
          private readonly eventHandlers: ReadonlyMap<string, ReadonlyArray<BoundHandler<Event>>>,
          private readonly options: MessageBusOptions
     ) {}

     /**
      * Handles `message` and then, breadth-first, every event it leads to. A
      * failing command handler rejects the returned promise; failing event
      * handlers are logged and skipped.
      */
     async handle(message: Message): Promise<void> {
          await this.uow.isolate(() => this.drain(message));
     }

     private async drain(message: Message): Promise<void> {
          const queue: Message[] = [message];
          let processed = 0;

          while (queue.length > 0) {
               const next = queue.shift();
               if (next === undefined) break;

               processed += 1;
               if (processed > this.options.maxMessages) {
                    throw new MessageLimitExceededError(this.options.maxMessages, next.type);
               }

               log.debug({ kind: next.kind, type: next.type }, 'Handling message');

               switch (next.kind) {
                    case 'command':
                         await this.handleCommand(next, queue);
                         break;
                    case 'event':
                         await this.handleEvent(next, queue);
                         break;
               }
          }
     }

     private async handleCommand(command: Command, queue: Message[]): Promise<void> {
          const handler = this.commandHandlers.get(command.type);
          if (!handler) {
               throw new NoCommandHandlerError(command.type);
          }

          try {
               await handler.handle(command);
          } catch (err) {
               const dropped = this.uow.collectNewEvents();
               if (dropped.length > 0) {
                    log.warn(
                         { commandType: command.type, dropped: dropped.map((e) => e.type) },
                         'Discarding events left by failed command'
                    );
               }
               throw err;
          }

          queue.push(...this.uow.collectNewEvents());
     }

     private async handleEvent(event: Event, queue: Message[]): Promise<void> {
          for (const handler of this.eventHandlers.get(event.type) ?? []) {
               try {
                    log.debug(
                         { eventType: event.type, handler: handler.handlerName },
                         'Running event handler'
                    );
                    await handler.handle(event);
               } catch (err) {
                    log.error(
                         { eventType: event.type, handler: handler.handlerName, err },
                         'Event handler failed'
                    );
               }
               queue.push(...this.uow.collectNewEvents());
          }
     }
}
