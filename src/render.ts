import { config, windowWidth, windowHeight } from "./config.js";
import type { Position, GameState, GameEvent, DrawCommand, Frame } from "./types.js";

export interface TextOptions {
  font: string;
  align?: "left" | "center";
}

/** Drawing surface and input source the game loop renders into. */
export interface Renderer {
  clearScreen(color: string): void;
  drawRect(cell: Position, color: string): void;
  drawLine(from: { x: number; y: number }, to: { x: number; y: number }, color: string): void;
  drawText(text: string, at: { x: number; y: number }, color: string, options: TextOptions): void;
  presentFrame(): void;
  /** Input received since the previous poll, oldest first. */
  pollEvents(): GameEvent[];
}

export interface FrameRenderer extends Renderer {
  pushEvent(event: GameEvent): void;
  lastFrame(): Frame | null;
}

/**
 * Renderer that records draw calls as a serializable Frame and hands each
 * presented frame to `onPresent`. Input is queued by whoever owns the window
 * (socket or HTTP handlers) and drained by the loop.
 */
export function createFrameRenderer(onPresent: (frame: Frame) => void = () => {}): FrameRenderer {
  let commands: DrawCommand[] = [];
  let last: Frame | null = null;
  let queue: GameEvent[] = [];

  return {
    clearScreen(color) {
      commands = [{ kind: "clear", color }];
    },
    drawRect(cell, color) {
      commands.push({
        kind: "rect",
        x: cell.x * config.cellSize,
        y: cell.y * config.cellSize,
        width: config.cellSize,
        height: config.cellSize,
        color,
      });
    },
    drawLine(from, to, color) {
      commands.push({ kind: "line", x1: from.x, y1: from.y, x2: to.x, y2: to.y, color });
    },
    drawText(text, at, color, options) {
      commands.push({ kind: "text", text, x: at.x, y: at.y, color, font: options.font, align: options.align ?? "left" });
    },
    presentFrame() {
      last = { width: windowWidth, height: windowHeight, commands };
      commands = [];
      onPresent(last);
    },
    pollEvents() {
      const events = queue;
      queue = [];
      return events;
    },
    pushEvent(event) {
      queue.push(event);
    },
    lastFrame() {
      return last;
    },
  };
}

// --- Scene ---

function drawGrid(renderer: Renderer) {
  for (let x = 0; x < windowWidth; x += config.cellSize) {
    renderer.drawLine({ x, y: 0 }, { x, y: windowHeight }, config.colors.grid);
  }
  for (let y = 0; y < windowHeight; y += config.cellSize) {
    renderer.drawLine({ x: 0, y }, { x: windowWidth, y }, config.colors.grid);
  }
}

export function renderGame(state: GameState, renderer: Renderer) {
  renderer.clearScreen(config.colors.background);
  drawGrid(renderer);
  renderer.drawRect(state.food.position, config.colors.food);

  state.snake.segments.forEach((cell, i) => {
    renderer.drawRect(cell, i === 0 ? config.colors.head : config.colors.body);
  });

  renderer.drawText(`Score: ${state.score}`, { x: 8, y: 6 }, config.colors.text, { font: config.fonts.small });

  if (state.status === "over") {
    const title = state.won ? "You Win" : "Game Over";
    const centerX = Math.floor(windowWidth / 2);
    const centerY = Math.floor(windowHeight / 2);
    renderer.drawText(title, { x: centerX, y: centerY - 10 }, config.colors.text, { font: config.fonts.big, align: "center" });
    renderer.drawText(
      "Press Enter to Restart or Esc to Quit",
      { x: centerX, y: centerY + 18 },
      config.colors.text,
      { font: config.fonts.small, align: "center" },
    );
  }

  renderer.presentFrame();
}
