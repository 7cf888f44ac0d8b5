export interface Position {
  x: number;
  y: number;
}

export type Direction = "UP" | "DOWN" | "LEFT" | "RIGHT";

export interface Snake {
  segments: Position[];       // segments[0] = head
  direction: Direction;       // applied on the last advance
  pendingDirection: Direction; // applied on the next advance
  pendingGrowth: number;
}

export interface Food {
  position: Position;
}

export type GameStatus = "running" | "over";

export interface GameState {
  tick: number;
  status: GameStatus;
  snake: Snake;
  food: Food;
  score: number;
  won: boolean;
}

export type GameEvent =
  | { type: "direction"; direction: Direction }
  | { type: "restart" }
  | { type: "quit" };

export type GameNotice =
  | { kind: "ate"; score: number; length: number }
  | { kind: "died"; reason: "wall" | "self"; score: number }
  | { kind: "won"; score: number };

export type DrawCommand =
  | { kind: "clear"; color: string }
  | { kind: "rect"; x: number; y: number; width: number; height: number; color: string }
  | { kind: "line"; x1: number; y1: number; x2: number; y2: number; color: string }
  | { kind: "text"; text: string; x: number; y: number; color: string; font: string; align: "left" | "center" };

export interface Frame {
  width: number;
  height: number;
  commands: DrawCommand[];
}
