import type { FastifyBaseLogger } from "fastify";
import { config } from "./config.js";
import type { GameState, GameNotice } from "./types.js";
import type { RandomSource } from "./board.js";
import type { Clock } from "./clock.js";
import { handleEvent, stepGame } from "./game.js";
import { renderGame, type Renderer } from "./render.js";

export type GameLogger = Pick<FastifyBaseLogger, "info" | "debug">;

export interface LoopOptions {
  state: GameState;
  renderer: Renderer;
  clock: Clock;
  log: GameLogger;
  fps?: number;
  random?: RandomSource;
}

function logNotice(log: GameLogger, notice: GameNotice) {
  switch (notice.kind) {
    case "ate":
      log.debug({ score: notice.score, length: notice.length }, "Snake ate food");
      break;
    case "died":
      log.info({ score: notice.score, reason: notice.reason }, "Game over");
      break;
    case "won":
      log.info({ score: notice.score }, "Board filled, game won");
      break;
  }
}

/**
 * Runs the game until a quit event is handled. Every tick: apply queued
 * input, advance the state once, render one frame, then wait for the clock.
 */
export async function runGameLoop(options: LoopOptions): Promise<GameState> {
  const { state, renderer, clock, log, fps = config.fps, random = Math.random } = options;
  log.info({ fps }, "Game started");

  for (;;) {
    for (const event of renderer.pollEvents()) {
      const outcome = handleEvent(state, event, random);
      if (outcome === "quit") {
        log.info({ tick: state.tick, score: state.score }, "Quit requested");
        return state;
      }
      if (outcome === "restarted") log.info("Game restarted");
    }

    for (const notice of stepGame(state, random)) {
      logNotice(log, notice);
    }

    renderGame(state, renderer);
    await clock.tick(fps);
  }
}
