/**
 * Create a simple stopwatch
 */
export function stopwatch(): { elapsed: () => number } {
  const start = performance.now();
  return {
    elapsed: () => performance.now() - start,
  };
}
