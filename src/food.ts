import type { Food } from "./types.js";
import { freeCells, randomInt, type RandomSource } from "./board.js";

/**
 * Moves the food to a cell picked uniformly from the grid minus `occupiedSet`.
 * Returns false, leaving the food in place, when the board has no free cell.
 */
export function respawnFood(food: Food, occupiedSet: Set<string>, random: RandomSource = Math.random): boolean {
  const free = freeCells(occupiedSet);
  if (free.length === 0) return false;
  food.position = free[randomInt(0, free.length, random)];
  return true;
}

export function createFood(occupiedSet: Set<string>, random: RandomSource = Math.random): Food {
  const food: Food = { position: { x: 0, y: 0 } };
  respawnFood(food, occupiedSet, random);
  return food;
}
