/**
 * Wrap `task` so overlapping calls share one in-flight run instead of
 * starting another. Once that run settles, the next call starts a new one.
 */
export function singleFlight<T>(task: () => Promise<T>): () => Promise<T> {
  let inFlight: Promise<T> | null = null;

  return () => {
    if (inFlight === null) {
      inFlight = task().finally(() => {
        inFlight = null;
      });
    }
    return inFlight;
  };
}
