import { ConfigurationError } from '../errors';
import type { ActionCapability } from './types';

export type ActionDescriptor = {
  name: string;
  description: string | null;
  cacheable: boolean;
};

export class ActionRegistry {
  private readonly capabilities = new Map<string, ActionCapability>();

  constructor(capabilities: Iterable<ActionCapability> = []) {
    for (const capability of capabilities) {
      this.register(capability);
    }
  }

  register(capability: ActionCapability): this {
    const name = capability.name.trim();
    if (!name) {
      throw new ConfigurationError('Action capabilities require a non-empty name');
    }
    if (this.capabilities.has(name)) {
      throw new ConfigurationError(`Action ${name} is already registered`);
    }
    this.capabilities.set(name, capability);
    return this;
  }

  has(name: string): boolean {
    return this.capabilities.has(name);
  }

  get(name: string): ActionCapability | undefined {
    return this.capabilities.get(name);
  }

  list(): ActionDescriptor[] {
    return Array.from(this.capabilities.values())
      .map((capability) => ({
        name: capability.name,
        description: capability.description ?? null,
        cacheable: (capability.cacheTtlSeconds ?? 0) > 0
      }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  get size(): number {
    return this.capabilities.size;
  }
}
