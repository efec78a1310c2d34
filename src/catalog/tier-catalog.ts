/**
 * Tier catalog: immutable lookup of named size tiers.
 */

import { UnknownTierError } from '../errors.js';
import type { TierDefinition } from './types.js';

export class TierCatalog {
  private readonly tiers: ReadonlyMap<string, TierDefinition>;

  constructor(tiers: readonly TierDefinition[]) {
    const map = new Map<string, TierDefinition>();
    for (const tier of tiers) {
      if (map.has(tier.name)) {
        throw new Error(`Duplicate tier name "${tier.name}"`);
      }
      if (!Number.isInteger(tier.itemLimit) || tier.itemLimit < 0) {
        throw new Error(`Tier "${tier.name}" has invalid itemLimit ${tier.itemLimit}`);
      }
      map.set(tier.name, Object.freeze({ ...tier }));
    }
    this.tiers = map;
  }

  /** Number of tiers in the catalog */
  get size(): number {
    return this.tiers.size;
  }

  /**
   * Look up a tier by name.
   * Throws UnknownTierError when the name is not in the catalog.
   */
  resolve(tierName: string): TierDefinition {
    const tier = this.tiers.get(tierName);
    if (!tier) {
      throw new UnknownTierError(tierName, this.names());
    }
    return tier;
  }

  has(tierName: string): boolean {
    return this.tiers.has(tierName);
  }

  /** All tiers, in catalog order. */
  list(): TierDefinition[] {
    return Array.from(this.tiers.values());
  }

  names(): string[] {
    return Array.from(this.tiers.keys());
  }
}
