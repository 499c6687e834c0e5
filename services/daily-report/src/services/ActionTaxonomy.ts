import { logger } from '@funnelreport/shared';
import { ACTION_KINDS } from '../types';
import type { ActionKind, TaxonomyTable } from '../types';

/**
 * Resolves raw event-type strings to canonical action kinds.
 *
 * The table is inverted once at construction so classification is a single map
 * lookup per event. Matching is exact and case-sensitive. When the same raw name is
 * listed under several kinds, the kind declared first in ACTION_KINDS keeps it.
 */
export class ActionTaxonomy {
  private readonly lookup = new Map<string, ActionKind>();

  constructor(table: TaxonomyTable) {
    for (const kind of ACTION_KINDS) {
      for (const rawName of table[kind]) {
        const owner = this.lookup.get(rawName);
        if (owner !== undefined) {
          logger.warn('Raw event type mapped to several action kinds', {
            eventType: rawName,
            kept: owner,
            ignored: kind,
          });
          continue;
        }
        this.lookup.set(rawName, kind);
      }
    }
  }

  classify(eventType: string): ActionKind | undefined {
    return this.lookup.get(eventType);
  }

  get size(): number {
    return this.lookup.size;
  }
}
