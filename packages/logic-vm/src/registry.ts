import type { OperatorMetadata } from '@rulelogic/types';
import { RegistryFrozenError } from './errors.js';
import { VARIADIC } from './operator.js';
import type { OperatorDefinition, OperatorFn } from './operator.js';

export class OperatorRegistry {
  // name -> definition currently in effect
  private operators = new Map<string, OperatorDefinition>();
  // name -> built-in definition, kept so that removing an override restores it
  private builtins = new Map<string, OperatorDefinition>();
  private frozen = false;

  constructor(builtins: Iterable<OperatorDefinition> = []) {
    for (const definition of builtins) {
      this.builtins.set(definition.name, definition);
      this.operators.set(definition.name, definition);
    }
  }

  /** Add or replace an operator. Last registration under a name wins. */
  register(definition: OperatorDefinition): void {
    this.assertMutable(`register ${definition.name}`);
    this.operators.set(definition.name, definition);
  }

  /** Register a plain function as an eager, variadic operator. */
  add(name: string, fn: OperatorFn, description = `Custom operator ${name}`): void {
    this.register({
      name,
      category: 'custom',
      description,
      mode: 'eager',
      arity: VARIADIC,
      execute: (args) => fn(...args),
    });
  }

  /**
   * Remove an operator. If it overrode a built-in, the built-in comes back.
   * Returns false when nothing was registered under the name.
   */
  unregister(name: string): boolean {
    this.assertMutable(`unregister ${name}`);
    const current = this.operators.get(name);
    if (!current) return false;
    const builtin = this.builtins.get(name);
    if (builtin && builtin !== current) {
      this.operators.set(name, builtin);
    } else {
      this.operators.delete(name);
    }
    return true;
  }

  get(name: string): OperatorDefinition | undefined {
    return this.operators.get(name);
  }

  has(name: string): boolean {
    return this.operators.has(name);
  }

  isBuiltin(name: string): boolean {
    const current = this.operators.get(name);
    return current !== undefined && current === this.builtins.get(name);
  }

  names(): string[] {
    return Array.from(this.operators.keys());
  }

  list(): OperatorMetadata[] {
    return Array.from(this.operators.values(), (definition) => ({
      name: definition.name,
      category: definition.category,
      description: definition.description,
      mode: definition.mode,
      arity: definition.arity,
      builtin: definition === this.builtins.get(definition.name),
    }));
  }

  /** Make the registry read-only. Mutations afterwards throw. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /** An unfrozen copy with the same built-ins and overrides. */
  clone(): OperatorRegistry {
    const copy = new OperatorRegistry();
    copy.builtins = new Map(this.builtins);
    copy.operators = new Map(this.operators);
    return copy;
  }

  private assertMutable(operation: string): void {
    if (this.frozen) throw new RegistryFrozenError(operation);
  }
}
