/** Monotonic integer sequence. Each session owns one for its message ids. */
export function createIdSequence(start = 1): () => number {
  let next = start;
  return () => next++;
}
