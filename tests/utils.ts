import { vi } from "vitest";
import type { Position, Direction, GameState } from "../src/types.js";
import type { Clock } from "../src/clock.js";

export const first: () => number = () => 0;

export function cells(...pairs: Array<[number, number]>): Position[] {
  return pairs.map(([x, y]) => ({ x, y }));
}

export function placeSnake(state: GameState, segments: Position[], direction: Direction) {
  state.snake.segments = segments;
  state.snake.direction = direction;
  state.snake.pendingDirection = direction;
  state.snake.pendingGrowth = 0;
}

export function createTestLogger() {
  return { info: vi.fn(), debug: vi.fn() };
}

/** Clock that never waits; `onTick` sees the 1-based tick count. */
export function createManualClock(onTick: (count: number) => void = () => {}): Clock & { count: () => number } {
  let count = 0;
  return {
    async tick() {
      count++;
      onTick(count);
    },
    count: () => count,
  };
}
