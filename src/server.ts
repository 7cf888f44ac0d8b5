#!/usr/bin/env node
import { loadEnv } from "./config.js";
import { createApp, configureApp } from "./app.js";
import { createSocketServer } from "./sockets.js";
import { createFrameRenderer } from "./render.js";
import { createFixedRateClock } from "./clock.js";
import { createGameState } from "./game.js";
import { runGameLoop } from "./loop.js";

async function main() {
  const env = loadEnv();
  const app = createApp(env);

  const state = createGameState();
  const renderer = createFrameRenderer((frame) => {
    io.emit("game:frame", frame);
  });
  const io = createSocketServer(app, renderer);

  try {
    await configureApp(app, {
      getState: () => state,
      pushEvent: (event) => renderer.pushEvent(event),
    });

    for (const signal of ["SIGINT", "SIGTERM", "SIGHUP"] as const) {
      process.once(signal, () => {
        app.log.info(`Received ${signal}`);
        renderer.pushEvent({ type: "quit" });
      });
    }

    const address = await app.listen({ port: env.PORT, host: env.HOST });
    app.log.info(`Snake running on ${address}`);

    await runGameLoop({ state, renderer, clock: createFixedRateClock(), log: app.log });
  } catch (err) {
    app.log.fatal({ err }, "Snake failed");
    await app.close();
    throw err;
  }

  await app.close();
}

main().then(
  () => process.exit(0),
  (err: unknown) => {
    console.error("Fatal:", err);
    process.exit(1);
  },
);
