import type { OrganizationDirectory, OverseerHandle, Target } from './types.js';

/**
 * Target registry configuration
 */
export interface TargetRegistryConfig {
  overseer: OverseerHandle;
  directory?: OrganizationDirectory;
}

/**
 * Name -> target directory with case-insensitive exact and substring lookup.
 *
 * Entries are references to externally owned workers; the registry never
 * controls their lifecycle.
 */
export class TargetRegistry {
  private targets: Map<string, Target>;
  private overseer: OverseerHandle;
  private directory: OrganizationDirectory | undefined;

  constructor(config: TargetRegistryConfig) {
    this.targets = new Map();
    this.overseer = config.overseer;
    this.directory = config.directory;
  }

  /**
   * Register a target under `name`. Re-registering a name replaces the entry.
   */
  register(name: string, target: Target): void {
    this.targets.set(name.toLowerCase(), target);

    if (target.reportsTo && !target.reportsTo.includes(this.overseer.id)) {
      target.reportsTo.push(this.overseer.id);
    }

    target.attachOverseer?.(this.overseer);
  }

  /**
   * Remove a registration
   */
  unregister(name: string): boolean {
    return this.targets.delete(name.toLowerCase());
  }

  /**
   * Resolve a name to a target id.
   *
   * Exact key first, then the lexicographically smallest key that contains
   * the query or is contained by it, then the organisation directory.
   */
  resolve(name: string): string | undefined {
    const key = name.toLowerCase();

    const exact = this.targets.get(key);
    if (exact) {
      return exact.id;
    }

    const [first] = this.resolveAll(name);
    if (first !== undefined) {
      return this.targets.get(first)?.id;
    }

    return this.lookupUnit(name);
  }

  /**
   * All registered keys matching `name` by substring, smallest first
   */
  resolveAll(name: string): string[] {
    const key = name.toLowerCase();
    if (key.length === 0) {
      return [];
    }

    return Array.from(this.targets.keys())
      .filter((candidate) => candidate.includes(key) || key.includes(candidate))
      .sort();
  }

  /**
   * Find a registered target by id
   */
  byId(id: string): Target | undefined {
    for (const target of this.targets.values()) {
      if (target.id === id) {
        return target;
      }
    }
    return undefined;
  }

  /**
   * Find the registered name of a target id
   */
  nameOf(id: string): string | undefined {
    for (const [name, target] of this.targets) {
      if (target.id === id) {
        return name;
      }
    }
    return undefined;
  }

  /**
   * Registered names in registration order
   */
  names(): string[] {
    return Array.from(this.targets.keys());
  }

  get size(): number {
    return this.targets.size;
  }

  private lookupUnit(name: string): string | undefined {
    if (!this.directory?.findUnitByName) {
      return undefined;
    }

    try {
      return this.directory.findUnitByName(name)?.id;
    } catch (error) {
      console.warn(`Organisation lookup failed for '${name}':`, error);
      return undefined;
    }
  }
}

/**
 * Create a target registry
 */
export function createTargetRegistry(config: TargetRegistryConfig): TargetRegistry {
  return new TargetRegistry(config);
}
