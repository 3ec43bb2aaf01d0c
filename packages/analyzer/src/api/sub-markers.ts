import type { SubMarkerBinding } from '../types/capabilities.js';
import type { MarkerType } from '../types/types.js';

/**
 * Bind a single-value sub-marker to a handler.
 *
 * The handler receives the sub-marker found on the same target, or
 * `undefined` when there is none.
 *
 * @example
 * ```typescript
 * class Table implements HasSubMarkers {
 *   comment?: string;
 *   subMarkers() {
 *     return [subMarker(Comment, (c) => (this.comment = c?.text))];
 *   }
 * }
 * ```
 */
export function subMarker<M extends object>(
  type: MarkerType<M>,
  handler: (value: M | undefined) => void
): SubMarkerBinding {
  return {
    type,
    apply(values) {
      handler(values.find((v): v is M => v instanceof type));
    },
  };
}

/**
 * Bind a multi-value sub-marker to a handler.
 *
 * The handler receives every sub-marker found, in attachment order; an empty
 * array when there is none. The marker type must be declared with
 * `@Marker({ multiple: true })` to be attached more than once.
 */
export function subMarkers<M extends object>(
  type: MarkerType<M>,
  handler: (values: M[]) => void
): SubMarkerBinding {
  return {
    type,
    apply(values) {
      handler(values.filter((v): v is M => v instanceof type));
    },
  };
}
