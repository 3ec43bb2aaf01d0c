import type { MarkerTarget, ReflectiveSource } from '../types/types.js';

/**
 * Ordered search lists for inheritable markers.
 *
 * - class targets: the structure, its ancestor classes (nearest first), then
 *   every implemented contract
 * - member and parameter targets: the same-named member (or parameter of the
 *   same-named method) on the declaring structure, then on each ancestor
 *   class. Contracts are skipped, they carry no components.
 *
 * The first entry carrying a matching marker wins, so no two entries can
 * conflict.
 */
export class Lineage {
  constructor(private readonly source: ReflectiveSource) {}

  searchList(target: MarkerTarget): MarkerTarget[] {
    const ancestors = this.source.ancestors(target.structure);
    if (target.kind === 'class') {
      const contracts = this.source.implementedContracts(target.structure);
      return [target, ...[...ancestors, ...contracts].map((structure) => ({ ...target, structure }))];
    }
    return [target, ...ancestors.map((structure) => ({ ...target, structure }))];
  }
}
