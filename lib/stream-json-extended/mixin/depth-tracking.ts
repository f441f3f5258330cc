import type { PositionedTokenName } from '../types/global';

const opening = new Set<PositionedTokenName>(['startObject', 'startArray']);
const closing = new Set<PositionedTokenName>(['endObject', 'endArray']);
const scalars = new Set<PositionedTokenName>([
  'stringValue',
  'numberValue',
  'trueValue',
  'falseValue',
  'nullValue'
]);

/**
 * An encapsulation of the depth tracking strategy for use when evaluating
 * tokens one at a time, such as when looking for the last token of a value
 * whose first token has already been seen.
 */
export function useDepthTracking() {
  let depth = 0;
  let values = 0;

  return {
    /**
     * Returns the current container depth. It is 0 between top-level values.
     *
     * For example, for `[{a: 1}]` when evaluating `1`, the depth will be `2`.
     */
    getDepth() {
      return depth;
    },
    /**
     * Returns the number of values at depth 0 that have been closed so far.
     * A scalar counts as soon as it is seen.
     */
    getCompletedValues() {
      return values;
    },
    /**
     * Returns `true` once at least one value has been closed and no container
     * is open.
     */
    isValueComplete() {
      return values > 0 && depth === 0;
    },
    /**
     * Updates the depth depending on the provided token. Keys and comments
     * leave it untouched.
     */
    updateDepth(token: { name: PositionedTokenName }) {
      if (opening.has(token.name)) {
        depth += 1;
      } else if (closing.has(token.name)) {
        depth -= 1;

        if (depth === 0) {
          values += 1;
        }
      } else if (depth === 0 && scalars.has(token.name)) {
        values += 1;
      }
    }
  };
}
