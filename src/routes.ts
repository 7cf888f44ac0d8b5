import type { FastifyInstance } from "fastify";
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from "fastify-type-provider-zod";
import {
  GameEventSchema,
  GameStateResponseSchema,
  ConfigResponseSchema,
  QueuedResponseSchema,
} from "./schemas.js";
import { config, windowWidth, windowHeight } from "./config.js";
import type { GameState, GameEvent } from "./types.js";

export interface RouteDeps {
  getState: () => GameState;
  pushEvent: (event: GameEvent) => void;
}

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps) {
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  typedApp.get("/api/state", {
    schema: {
      description: "Snapshot of the current game state",
      tags: ["game"],
      response: { 200: GameStateResponseSchema },
    },
  }, async () => {
    const { tick, status, score, won, snake, food } = deps.getState();
    return {
      tick,
      status,
      score,
      won,
      snake: {
        segments: snake.segments.map(s => ({ ...s })),
        direction: snake.direction,
        pendingDirection: snake.pendingDirection,
        length: snake.segments.length,
      },
      food: { position: { ...food.position } },
      grid: { cols: config.gridCols, rows: config.gridRows },
    };
  });

  typedApp.get("/api/config", {
    schema: {
      description: "Fixed grid and display settings",
      tags: ["game"],
      response: { 200: ConfigResponseSchema },
    },
  }, async () => ({
    gridCols: config.gridCols,
    gridRows: config.gridRows,
    cellSize: config.cellSize,
    fps: config.fps,
    width: windowWidth,
    height: windowHeight,
  }));

  typedApp.post("/api/input", {
    schema: {
      description: "Queue an input event for the next tick (direction, restart or quit)",
      tags: ["input"],
      body: GameEventSchema,
      response: { 200: QueuedResponseSchema },
    },
  }, async (request) => {
    deps.pushEvent(request.body);
    return { status: "queued" as const };
  });
}
