// Infrastructure: In-memory encounter registry
// Encounters live only as long as the process

import type { EncounterEngine } from '@/application/combat/EncounterEngine.js';
import { EncounterState } from '@/domain/combat/types.js';
import { EncounterConfigError, EncounterNotFoundError } from '@/utils/errors.js';
import type { RegistryConfig } from '@/utils/config.js';

export interface IEncounterRegistry {
  add(engine: EncounterEngine): void;
  get(id: string): EncounterEngine | undefined;
  require(id: string): EncounterEngine;
  remove(id: string): boolean;
  list(): string[];
  /** Stored encounters, finished ones included */
  readonly size: number;
  /** Encounters that have not reached ENDED */
  readonly activeCount: number;
}

export class InMemoryEncounterRegistry implements IEncounterRegistry {
  private encounters = new Map<string, EncounterEngine>();

  constructor(private config: RegistryConfig) {}

  add(engine: EncounterEngine): void {
    if (this.encounters.has(engine.encounterId)) {
      throw new EncounterConfigError(`Encounter already registered: ${engine.encounterId}`, {
        encounterId: engine.encounterId,
      });
    }
    const limit = this.config.maxActiveEncounters;
    if (this.activeCount >= limit) {
      throw new EncounterConfigError(`Too many active encounters (limit ${limit})`, { limit });
    }
    // Finished encounters stay readable until their slot is needed
    this.evictEnded(this.encounters.size - limit + 1);
    this.encounters.set(engine.encounterId, engine);
  }

  get(id: string): EncounterEngine | undefined {
    return this.encounters.get(id);
  }

  require(id: string): EncounterEngine {
    const engine = this.encounters.get(id);
    if (!engine) {
      throw new EncounterNotFoundError(id);
    }
    return engine;
  }

  /**
   * Abandon an encounter at any state.
   */
  remove(id: string): boolean {
    return this.encounters.delete(id);
  }

  list(): string[] {
    return Array.from(this.encounters.keys());
  }

  get size(): number {
    return this.encounters.size;
  }

  get activeCount(): number {
    let count = 0;
    for (const engine of this.encounters.values()) {
      if (engine.state !== EncounterState.ENDED) count++;
    }
    return count;
  }

  // Oldest first: Map iteration follows insertion order
  private evictEnded(count: number): void {
    let remaining = count;
    for (const [id, engine] of this.encounters) {
      if (remaining <= 0) return;
      if (engine.state === EncounterState.ENDED) {
        this.encounters.delete(id);
        remaining--;
      }
    }
  }
}
