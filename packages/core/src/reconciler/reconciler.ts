/**
 * Pure set arithmetic over identifiers. Output order follows the iteration
 * order of the first operand.
 */

export type DiffResult = {
  /** In source, not in destination */
  toAdd: ReadonlySet<string>;
  /** In destination, not in source */
  toRemove: ReadonlySet<string>;
};

function subtract(left: ReadonlySet<string>, right: ReadonlySet<string>): Set<string> {
  const result = new Set<string>();
  for (const value of left) {
    if (!right.has(value)) {
      result.add(value);
    }
  }
  return result;
}

export function diff(source: ReadonlySet<string>, destination: ReadonlySet<string>): DiffResult {
  return {
    toAdd: subtract(source, destination),
    toRemove: subtract(destination, source),
  };
}

export function planCopy(source: ReadonlySet<string>, destination: ReadonlySet<string>): ReadonlySet<string> {
  return subtract(source, destination);
}

/**
 * Identifiers that were requested and are actually members. Requested
 * non-members are dropped silently.
 */
export function planRemoval(requested: ReadonlySet<string>, destination: ReadonlySet<string>): ReadonlySet<string> {
  const result = new Set<string>();
  for (const value of requested) {
    if (destination.has(value)) {
      result.add(value);
    }
  }
  return result;
}
