export interface Clock {
  /** Resolves at the next frame boundary for the given rate. */
  tick(fps: number): Promise<void>;
}

export interface TimeSource {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemTime: TimeSource = {
  now: () => performance.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Frame pacing on a fixed grid: each boundary is one period after the
 * previous one, so timer jitter does not accumulate. A loop that falls behind
 * by more than a period resynchronizes to now rather than running frames back
 * to back.
 */
export function createFixedRateClock(time: TimeSource = systemTime): Clock {
  let nextBoundary: number | null = null;

  return {
    async tick(fps) {
      const period = 1000 / fps;
      const now = time.now();
      nextBoundary = (nextBoundary ?? now) + period;

      if (nextBoundary <= now) {
        nextBoundary = now;
        return;
      }
      await time.sleep(nextBoundary - now);
    },
  };
}
