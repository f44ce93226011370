/**
 * Identifier generation for runs and tasks.
 */

let sequence = 0;

/**
 * Generate a unique id like "exec_1706812800000_1_a1b2c3d".
 * The per-process sequence keeps ids distinct within the same millisecond.
 */
export function generateId(prefix: string): string {
  sequence += 1;
  return `${prefix}_${Date.now()}_${sequence}_${Math.random().toString(36).slice(2, 9)}`;
}
