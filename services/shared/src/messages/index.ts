import type { Command } from './commands';
import type { Event } from './events';

export * from './commands';
export * from './events';
export * from './journal';

/** Everything the message bus accepts, discriminated by `kind` and then by `type`. */
export type Message = Command | Event;
