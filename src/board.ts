import { config } from "./config.js";
import type { Position, Direction } from "./types.js";

export type RandomSource = () => number;

export function randomInt(min: number, max: number, random: RandomSource = Math.random): number {
  return Math.floor(random() * (max - min)) + min;
}

export function positionKey(p: Position): string {
  return `${p.x},${p.y}`;
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

export function isInBounds(p: Position): boolean {
  return p.x >= 0 && p.x < config.gridCols && p.y >= 0 && p.y < config.gridRows;
}

interface DirectionInfo {
  dx: number;
  dy: number;
  opposite: Direction;
}

// Screen coordinates: y grows downward
export const directions: Readonly<Record<Direction, DirectionInfo>> = {
  UP:    { dx: 0, dy: -1, opposite: "DOWN" },
  DOWN:  { dx: 0, dy: 1, opposite: "UP" },
  LEFT:  { dx: -1, dy: 0, opposite: "RIGHT" },
  RIGHT: { dx: 1, dy: 0, opposite: "LEFT" },
};

export function movePosition(p: Position, direction: Direction): Position {
  const { dx, dy } = directions[direction];
  return { x: p.x + dx, y: p.y + dy };
}

export function isReversal(current: Direction, requested: Direction): boolean {
  return directions[current].opposite === requested;
}

export function buildOccupiedSet(positions: Position[]): Set<string> {
  const set = new Set<string>();
  for (const p of positions) {
    set.add(positionKey(p));
  }
  return set;
}

// Row-major scan, so the result order is stable for a given occupied set
export function freeCells(occupiedSet: Set<string>): Position[] {
  const cells: Position[] = [];
  for (let y = 0; y < config.gridRows; y++) {
    for (let x = 0; x < config.gridCols; x++) {
      const pos = { x, y };
      if (!occupiedSet.has(positionKey(pos))) cells.push(pos);
    }
  }
  return cells;
}
