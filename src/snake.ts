import { config } from "./config.js";
import type { Position, Direction, Snake } from "./types.js";
import {
  movePosition, isReversal, isInBounds, samePosition, buildOccupiedSet,
} from "./board.js";

function startingSegments(): Position[] {
  const startX = Math.floor(config.gridCols / 2);
  const startY = Math.floor(config.gridRows / 2);
  return Array.from({ length: config.startingLength }, (_, i) => ({ x: startX - i, y: startY }));
}

export function createSnake(): Snake {
  return {
    segments: startingSegments(),
    direction: "RIGHT",
    pendingDirection: "RIGHT",
    pendingGrowth: 0,
  };
}

export function resetSnake(snake: Snake) {
  const fresh = createSnake();
  snake.segments = fresh.segments;
  snake.direction = fresh.direction;
  snake.pendingDirection = fresh.pendingDirection;
  snake.pendingGrowth = fresh.pendingGrowth;
}

export function snakeHead(snake: Snake): Position {
  return snake.segments[0];
}

/**
 * Requests a turn for the next advance. A request for the opposite of the
 * direction the snake last moved in is dropped, so the snake can never fold
 * back onto its neck no matter how many keys arrive within one tick.
 */
export function setDirection(snake: Snake, direction: Direction) {
  if (isReversal(snake.direction, direction)) return;
  snake.pendingDirection = direction;
}

export function grow(snake: Snake, amount = 1) {
  snake.pendingGrowth += amount;
}

export function advance(snake: Snake) {
  snake.direction = snake.pendingDirection;
  const newHead = movePosition(snakeHead(snake), snake.direction);
  snake.segments.unshift(newHead);

  if (snake.pendingGrowth > 0) {
    snake.pendingGrowth--;
  } else {
    snake.segments.pop();
  }
}

export function collidesWithWall(snake: Snake): boolean {
  return !isInBounds(snakeHead(snake));
}

export function collidesWithSelf(snake: Snake): boolean {
  const head = snakeHead(snake);
  return snake.segments.some((s, i) => i > 0 && samePosition(s, head));
}

export function occupiedCells(snake: Snake): Set<string> {
  return buildOccupiedSet(snake.segments);
}
