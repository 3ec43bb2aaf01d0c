import type { MarkerType, Structure } from '../types/types.js';

/**
 * Unbounded cache of resolved markers.
 *
 * Keyed by structure (weakly, so analyzed classes can still be collected)
 * and then by marker type. Entries live until clear().
 */
export class AnalysisCache {
  private index = new WeakMap<Structure, Map<MarkerType, object>>();

  /**
   * @returns The marker cached for the pair, if any
   */
  get(structure: Structure, type: MarkerType): object | undefined {
    return this.index.get(structure)?.get(type);
  }

  /**
   * Store a resolved marker. Overwrites an existing entry for the pair.
   */
  set(structure: Structure, type: MarkerType, marker: object): void {
    let byType = this.index.get(structure);
    if (!byType) {
      byType = new Map();
      this.index.set(structure, byType);
    }
    byType.set(type, marker);
  }

  /**
   * Drop every entry. WeakMap cannot be cleared in place, so the index is
   * replaced.
   */
  clear(): void {
    this.index = new WeakMap();
  }
}
