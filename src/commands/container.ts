import { CommandType } from './types.js';

// Dependency-injection collaborator: hands out command instances
export interface Container {
  construct<T extends object>(type: CommandType<T>): T;
}

/**
 * Builds commands with `new type()` unless a factory is bound for the type.
 */
export class SimpleContainer implements Container {
  private factories = new Map<Function, () => object>();

  bind<T extends object>(type: CommandType<T>, factory: () => T): this {
    this.factories.set(type, factory);
    return this;
  }

  construct<T extends object>(type: CommandType<T>): T {
    const factory = this.factories.get(type);
    if (!factory) return new type();
    const instance = factory();
    if (instance instanceof type) return instance;
    throw new TypeError(`Factory bound for ${type.name} returned an instance of another class`);
  }
}
