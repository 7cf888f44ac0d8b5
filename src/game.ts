import type { GameState, GameEvent, GameNotice } from "./types.js";
import type { RandomSource } from "./board.js";
import { samePosition } from "./board.js";
import {
  createSnake, resetSnake, setDirection, advance, grow,
  collidesWithWall, collidesWithSelf, occupiedCells, snakeHead,
} from "./snake.js";
import { createFood, respawnFood } from "./food.js";

export function createGameState(random: RandomSource = Math.random): GameState {
  const snake = createSnake();
  return {
    tick: 0,
    status: "running",
    snake,
    food: createFood(occupiedCells(snake), random),
    score: 0,
    won: false,
  };
}

export function resetGame(state: GameState, random: RandomSource = Math.random) {
  resetSnake(state.snake);
  respawnFood(state.food, occupiedCells(state.snake), random);
  state.score = 0;
  state.won = false;
  state.status = "running";
}

export type EventOutcome = "applied" | "ignored" | "restarted" | "quit";

export function handleEvent(state: GameState, event: GameEvent, random: RandomSource = Math.random): EventOutcome {
  switch (event.type) {
    case "quit":
      return "quit";
    case "restart":
      if (state.status !== "over") return "ignored";
      resetGame(state, random);
      return "restarted";
    case "direction":
      if (state.status !== "running") return "ignored";
      setDirection(state.snake, event.direction);
      return "applied";
  }
}

// --- Tick ---

export function stepGame(state: GameState, random: RandomSource = Math.random): GameNotice[] {
  state.tick++;
  if (state.status !== "running") return [];

  const notices: GameNotice[] = [];
  const { snake, food } = state;

  // 1. Move
  advance(snake);

  // 2. Eat
  if (samePosition(snakeHead(snake), food.position)) {
    state.score++;
    grow(snake);
    notices.push({ kind: "ate", score: state.score, length: snake.segments.length + snake.pendingGrowth });
    if (!respawnFood(food, occupiedCells(snake), random)) {
      state.status = "over";
      state.won = true;
      notices.push({ kind: "won", score: state.score });
      return notices;
    }
  }

  // 3. Collide
  const reason = collidesWithWall(snake) ? "wall" : collidesWithSelf(snake) ? "self" : null;
  if (reason) {
    state.status = "over";
    notices.push({ kind: "died", reason, score: state.score });
  }

  return notices;
}
