/**
 * Interval polling for the dashboard's auto-refresh
 */

/**
 * Call `run` every `intervalSeconds` while `shouldRun()` holds at tick time.
 * Returns a function that stops the timer.
 */
export function startPolling(
  intervalSeconds: number,
  shouldRun: () => boolean,
  run: () => Promise<void>
): () => void {
  const timer = setInterval(() => {
    if (shouldRun()) {
      void run();
    }
  }, intervalSeconds * 1000);
  return () => clearInterval(timer);
}
