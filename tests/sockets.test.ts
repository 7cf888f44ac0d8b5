import { describe, it, expect, vi, afterEach } from "vitest";
import Fastify, { type FastifyInstance } from "fastify";
import { io as connect, type Socket } from "socket.io-client";
import { acceptInput, createPageTracker, createSocketServer } from "../src/sockets.js";
import { configureApp } from "../src/app.js";
import { createFrameRenderer, type FrameRenderer } from "../src/render.js";
import { createGameState } from "../src/game.js";
import type { GameEvent } from "../src/types.js";
import { first } from "./utils.js";

describe("acceptInput", () => {
  it("queues known events", () => {
    const renderer = createFrameRenderer();
    const log = { debug: vi.fn() };

    expect(acceptInput({ type: "direction", direction: "DOWN" }, renderer, log)).toBe(true);
    expect(acceptInput({ type: "restart" }, renderer, log)).toBe(true);
    expect(renderer.pollEvents()).toEqual([{ type: "direction", direction: "DOWN" }, { type: "restart" }]);
    expect(log.debug).not.toHaveBeenCalled();
  });

  it("drops anything else", () => {
    const renderer = createFrameRenderer();
    const log = { debug: vi.fn() };

    expect(acceptInput({ type: "direction", direction: "NORTH" }, renderer, log)).toBe(false);
    expect(acceptInput("ArrowUp", renderer, log)).toBe(false);
    expect(acceptInput(null, renderer, log)).toBe(false);
    expect(renderer.pollEvents()).toEqual([]);
    expect(log.debug).toHaveBeenCalledTimes(3);
  });
});

describe("createPageTracker", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("fires once the last page has been gone for the grace period", () => {
    vi.useFakeTimers();
    const onClosed = vi.fn();
    const pages = createPageTracker(onClosed, 3000);

    expect(pages.connected()).toBe(1);
    expect(pages.connected()).toBe(2);
    expect(pages.disconnected()).toBe(1);
    vi.advanceTimersByTime(5000);
    expect(onClosed).not.toHaveBeenCalled();

    expect(pages.disconnected()).toBe(0);
    vi.advanceTimersByTime(2999);
    expect(onClosed).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(onClosed).toHaveBeenCalledTimes(1);
  });

  it("keeps running when a page reconnects in time", () => {
    vi.useFakeTimers();
    const onClosed = vi.fn();
    const pages = createPageTracker(onClosed, 3000);

    pages.connected();
    pages.disconnected();
    vi.advanceTimersByTime(1000);
    pages.connected();
    vi.advanceTimersByTime(10_000);

    expect(onClosed).not.toHaveBeenCalled();
  });

  it("cancels a pending close on dispose", () => {
    vi.useFakeTimers();
    const onClosed = vi.fn();
    const pages = createPageTracker(onClosed, 3000);

    pages.connected();
    pages.disconnected();
    pages.dispose();
    vi.advanceTimersByTime(10_000);

    expect(onClosed).not.toHaveBeenCalled();
  });
});

describe("createSocketServer", () => {
  let app: FastifyInstance | null = null;
  let page: Socket | null = null;

  afterEach(async () => {
    page?.close();
    page = null;
    await app?.close();
    app = null;
  });

  async function startServer(windowCloseGraceMs: number): Promise<{ server: FastifyInstance; renderer: FrameRenderer; address: string }> {
    const server = Fastify({ logger: false });
    app = server;
    const state = createGameState(first);
    const renderer = createFrameRenderer();
    createSocketServer(server, renderer, { windowCloseGraceMs });
    await configureApp(server, {
      getState: () => state,
      pushEvent: (event) => renderer.pushEvent(event),
    });
    const address = await server.listen({ port: 0, host: "127.0.0.1" });
    return { server, renderer, address };
  }

  function openPage(address: string): Promise<Socket> {
    return new Promise((resolve, reject) => {
      const socket = connect(address, { transports: ["websocket"], reconnection: false });
      socket.once("connect", () => resolve(socket));
      socket.once("connect_error", reject);
    });
  }

  async function waitForEvents(renderer: FrameRenderer, expected: GameEvent[]) {
    const received: GameEvent[] = [];
    await vi.waitFor(() => {
      received.push(...renderer.pollEvents());
      expect(received).toEqual(expected);
    }, { timeout: 2000, interval: 10 });
  }

  it("closes while a page is connected", async () => {
    const { server, address } = await startServer(60_000);
    page = await openPage(address);

    app = null;
    const result = await Promise.race([
      server.close().then(() => "closed"),
      new Promise((resolve) => setTimeout(() => resolve("hung"), 3000)),
    ]);

    expect(result).toBe("closed");
  });

  it("forwards page input to the game", async () => {
    const { renderer, address } = await startServer(60_000);
    page = await openPage(address);

    page.emit("input", { type: "direction", direction: "UP" });
    page.emit("input", { type: "fly" });
    page.emit("input", { type: "quit" });

    await waitForEvents(renderer, [{ type: "direction", direction: "UP" }, { type: "quit" }]);
  });

  it("quits after the last page closes", async () => {
    const { renderer, address } = await startServer(20);
    page = await openPage(address);

    page.close();
    page = null;

    await waitForEvents(renderer, [{ type: "quit" }]);
  });
});
