import type { Publish, SendMail } from '../types/allocation.types';
import type { UnitOfWork } from '../unit-of-work/unit-of-work';
import { MissingDependencyError } from '../utils/errors';

/** Every collaborator a handler may ask for, by name. */
export interface Dependencies {
     uow: UnitOfWork;
     sendMail: SendMail;
     publish: Publish;
}

export type DependencyName = keyof Dependencies;

/**
 * A handler together with the names of the collaborators it needs. `handle`
 * receives the message plus exactly those collaborators.
 */
export interface HandlerDefinition<M, K extends DependencyName = DependencyName> {
     readonly name: string;
     readonly requires: readonly K[];
     handle(message: M, dependencies: Pick<Dependencies, K>): Promise<void>;
}

/** A handler with its collaborators already bound; only the message is passed per call. */
export interface BoundHandler<M> {
     readonly handlerName: string;
     /** Required names that were absent at bind time. */
     readonly missing: readonly DependencyName[];
     handle(message: M): Promise<void>;
}

export function defineHandler<M, K extends DependencyName>(
     name: string,
     requires: readonly K[],
     handle: (message: M, dependencies: Pick<Dependencies, K>) => Promise<void>
): HandlerDefinition<M, K> {
     return { name, requires, handle };
}

function hasAll<K extends DependencyName>(
     bound: Partial<Dependencies>,
     names: readonly K[]
): bound is Partial<Dependencies> & Pick<Dependencies, K> {
     return names.every((name) => bound[name] !== undefined);
}

/**
 * Binds the collaborators `definition` declares from `dependencies`. The bound
 * set is copied and frozen here, so later changes to `dependencies` never reach
 * the returned handler. Absent names are reported in `missing`, and calling the
 * handler then fails with MissingDependencyError.
 */
export function inject<M, K extends DependencyName>(
     definition: HandlerDefinition<M, K>,
     dependencies: Partial<Dependencies>
): BoundHandler<M> {
     const bound: Partial<Dependencies> = {};
     for (const name of definition.requires) {
          if (dependencies[name] !== undefined) {
               bound[name] = dependencies[name];
          }
     }
     Object.freeze(bound);

     const missing = definition.requires.filter((name) => bound[name] === undefined);

     return {
          handlerName: definition.name,
          missing,
          handle: async (message: M) => {
               if (!hasAll(bound, definition.requires)) {
                    throw new MissingDependencyError(definition.name, missing);
               }
               await definition.handle(message, bound);
          },
     };
}
