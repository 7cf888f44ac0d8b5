import { z } from "zod";

export const DirectionSchema = z.enum(["UP", "DOWN", "LEFT", "RIGHT"]);

export const PositionSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
});

export const GameEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("direction"), direction: DirectionSchema }),
  z.object({ type: z.literal("restart") }),
  z.object({ type: z.literal("quit") }),
]);

export const QueuedResponseSchema = z.object({
  status: z.literal("queued"),
});

export const GameStateResponseSchema = z.object({
  tick: z.number(),
  status: z.enum(["running", "over"]),
  score: z.number(),
  won: z.boolean(),
  snake: z.object({
    segments: z.array(PositionSchema),
    direction: DirectionSchema,
    pendingDirection: DirectionSchema,
    length: z.number(),
  }),
  food: z.object({ position: PositionSchema }),
  grid: z.object({ cols: z.number(), rows: z.number() }),
});

export const ConfigResponseSchema = z.object({
  gridCols: z.number(),
  gridRows: z.number(),
  cellSize: z.number(),
  fps: z.number(),
  width: z.number(),
  height: z.number(),
});
