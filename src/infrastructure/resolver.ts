import createDebug from 'debug';
import {
  CircularReferenceError,
  FactoryError,
  ResolveError,
  ServiceNotFoundError,
} from '../domain/errors.js';
import type { PendingEntry } from '../domain/service-entry.js';
import { ServiceInstance } from '../domain/service-entry.js';
import type { ServiceKey } from '../domain/service-key.js';
import { describeKey } from '../domain/service-key.js';
import type {
  FactoryErrorPolicy,
  IRegistry,
  IResolver,
  IServiceProvider,
  IValidator,
} from '../domain/types.js';
import { Validator } from '../domain/validation.js';

const debug = createDebug('lazywire:resolver');

export interface ResolverDeps {
  registry: IRegistry;
  name?: string;
  onFactoryError?: FactoryErrorPolicy;
  validator?: IValidator;
}

/**
 * Core resolver — lazy, memoized construction driven by the registry's entry states.
 *
 * A request for a key whose slot already holds the in-progress sentinel is a
 * cycle. The `constructing` stack mirrors the keys whose factories are
 * currently running; it only feeds error messages.
 */
export class Resolver implements IResolver {
  private readonly registry: IRegistry;
  private readonly name?: string;
  private readonly onFactoryError: FactoryErrorPolicy;
  private readonly validator: IValidator;
  private readonly constructing: ServiceKey[] = [];

  constructor(deps: ResolverDeps) {
    this.registry = deps.registry;
    this.name = deps.name;
    this.onFactoryError = deps.onFactoryError ?? 'poison';
    this.validator = deps.validator ?? new Validator();
  }

  getName(): string | undefined {
    return this.name;
  }

  getRegistry(): IRegistry {
    return this.registry;
  }

  resolve(key: ServiceKey, provider: IServiceProvider): ServiceInstance {
    const typeName = describeKey(key);
    const previous = this.registry.takeForResolution(key);

    if (previous === undefined) {
      const registered = this.registry.typeNames();
      const suggestion = this.validator.suggestName(typeName, registered);
      debug('resolve %s → not found', typeName);
      throw new ServiceNotFoundError(typeName, this.chain(), registered, suggestion);
    }

    switch (previous.state) {
      case 'resolved':
        this.registry.restore(key, previous);
        debug('resolve %s → cached', typeName);
        return previous.instance;

      case 'in-progress': {
        // The owner of the sentinel is further up the stack (or failed earlier); leave it.
        const onStack = this.constructing.includes(key);
        debug('resolve %s → circular (on stack: %s)', typeName, onStack);
        throw new CircularReferenceError(typeName, this.chain(), onStack);
      }

      case 'pending':
        return this.construct(key, previous, provider);
    }
  }

  private construct(
    key: ServiceKey,
    entry: PendingEntry,
    provider: IServiceProvider,
  ): ServiceInstance {
    debug('resolve %s → constructing', entry.typeName);
    this.constructing.push(key);

    try {
      const instance = new ServiceInstance(key, entry.factory(provider));
      this.registry.storeResolved(key, instance);
      debug('resolved %s', entry.typeName);
      return instance;
    } catch (error) {
      if (this.onFactoryError === 'retry') {
        this.registry.restore(key, entry);
      }
      debug('construct %s failed (%s)', entry.typeName, this.onFactoryError);
      if (error instanceof ResolveError) {
        throw error;
      }
      throw new FactoryError(entry.typeName, this.chain(), error);
    } finally {
      this.constructing.pop();
    }
  }

  private chain(): string[] {
    return this.constructing.map(describeKey);
  }
}
