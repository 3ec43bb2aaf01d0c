/* MemoryCacheAnalyzer
 *
 * Memoizing ClassAnalyzer. Wraps any other analyzer and remembers each
 * resolved (structure, marker type) pair for the life of the instance.
 *
 * Notes:
 *  - A hit returns the identical marker instance; the wrapped analyzer is
 *    not called.
 *  - The cache is written only after the wrapped call returns. A failing
 *    resolution leaves nothing behind and fails again next time.
 *  - Instances are normalized to their class before lookup, so a class and
 *    its instances share one entry.
 */

import type { ClassAnalyzer, MarkerType, Structure } from '../types/types.js';
import { AnalysisCache } from './analysis-cache.js';
import { toStructure } from './structure.js';

export class MemoryCacheAnalyzer implements ClassAnalyzer {
  constructor(
    private readonly analyzer: ClassAnalyzer,
    private readonly cache: AnalysisCache = new AnalysisCache()
  ) {}

  analyze<M extends object>(subject: Structure | object, type: MarkerType<M>): M {
    const structure = toStructure(subject);
    const hit = this.cache.get(structure, type);
    if (hit instanceof type) return hit;

    const marker = this.analyzer.analyze(structure, type);
    this.cache.set(structure, type, marker);
    return marker;
  }

  /**
   * Forget every resolved marker.
   */
  clear(): void {
    this.cache.clear();
  }
}
