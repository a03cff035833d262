let lastStamp = 0;
let sequence = 0;

/**
 * Generate a unique, time-ordered ID.
 *
 * IDs created later sort after earlier ones, both numerically by their
 * timestamp and lexicographically, including several within one millisecond.
 */
export function timeOrderedId(prefix: string): string {
  const now = Date.now();
  if (now > lastStamp) {
    lastStamp = now;
    sequence = 0;
  } else {
    sequence += 1;
  }
  const stamp = String(lastStamp).padStart(13, "0");
  const seq = sequence.toString(36).padStart(4, "0");
  return `${prefix}-${stamp}-${seq}`;
}
