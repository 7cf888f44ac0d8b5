import { Server } from "socket.io";
import type { FastifyBaseLogger, FastifyInstance } from "fastify";
import { config } from "./config.js";
import { GameEventSchema } from "./schemas.js";
import type { Frame } from "./types.js";
import type { FrameRenderer } from "./render.js";

export interface ServerToClientEvents {
  "game:frame": (frame: Frame) => void;
}

export interface ClientToServerEvents {
  input: (event: unknown) => void;
}

export type GameServer = Server<ClientToServerEvents, ServerToClientEvents>;

export interface SocketOptions {
  /** How long the game waits for a page to come back before quitting. */
  windowCloseGraceMs?: number;
}

/** Queues a page's input if it is a known event; anything else is dropped. */
export function acceptInput(raw: unknown, renderer: Pick<FrameRenderer, "pushEvent">, log: Pick<FastifyBaseLogger, "debug">): boolean {
  const parsed = GameEventSchema.safeParse(raw);
  if (!parsed.success) {
    log.debug({ input: raw }, "Ignoring unrecognized input");
    return false;
  }
  renderer.pushEvent(parsed.data);
  return true;
}

/**
 * Counts open pages. When the last one goes away, `onWindowClosed` fires
 * after `graceMs` unless a page connects again first (a reload).
 */
export function createPageTracker(onWindowClosed: () => void, graceMs: number) {
  let pageCount = 0;
  let closeTimer: ReturnType<typeof setTimeout> | null = null;

  function cancel() {
    if (closeTimer) {
      clearTimeout(closeTimer);
      closeTimer = null;
    }
  }

  return {
    connected(): number {
      cancel();
      return ++pageCount;
    },
    disconnected(): number {
      pageCount = Math.max(0, pageCount - 1);
      if (pageCount === 0) {
        cancel();
        closeTimer = setTimeout(() => {
          closeTimer = null;
          onWindowClosed();
        }, graceMs);
      }
      return pageCount;
    },
    dispose: cancel,
  };
}

export function attachSockets(
  io: GameServer,
  renderer: FrameRenderer,
  log: FastifyBaseLogger,
  options: SocketOptions = {},
) {
  const graceMs = options.windowCloseGraceMs ?? config.windowCloseGraceMs;
  const pages = createPageTracker(() => {
    log.info("Last page closed");
    renderer.pushEvent({ type: "quit" });
  }, graceMs);

  io.on("connection", (socket) => {
    log.info(`Page connected (${pages.connected()} total)`);

    // Paint the current frame immediately
    const frame = renderer.lastFrame();
    if (frame) socket.emit("game:frame", frame);

    socket.on("input", (raw) => {
      acceptInput(raw, renderer, log);
    });

    socket.on("disconnect", () => {
      log.info(`Page disconnected (${pages.disconnected()} total)`);
    });
  });

  return pages;
}

/**
 * Socket.io on top of Fastify's underlying HTTP server. Pages are closed in
 * `preClose`: Fastify's server close would otherwise wait on their
 * connections forever.
 */
export function createSocketServer(
  app: FastifyInstance,
  renderer: FrameRenderer,
  options: SocketOptions = {},
): GameServer {
  const io: GameServer = new Server<ClientToServerEvents, ServerToClientEvents>(app.server, {
    cors: { origin: "*" },
  });
  const pages = attachSockets(io, renderer, app.log, options);

  app.addHook("preClose", async () => {
    pages.dispose();
    await io.close();
  });

  return io;
}
