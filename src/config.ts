import { z } from "zod";

export const config = {
  gridCols: 30,
  gridRows: 20,
  cellSize: 20,             // pixels per cell
  fps: 12,                  // ticks/second, constant
  startingLength: 3,
  windowCloseGraceMs: 3000, // reload window before a closed page quits the game
  colors: {
    background: "#000000",
    text: "#ffffff",
    body: "#00c800",
    head: "#009600",
    food: "#c80000",
    grid: "#282828",
  },
  fonts: {
    small: "18px consolas, monospace",
    big: "bold 28px consolas, monospace",
  },
} as const;

export const windowWidth = config.gridCols * config.cellSize;
export const windowHeight = config.gridRows * config.cellSize;

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().min(1).default("127.0.0.1"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type ServerEnv = z.infer<typeof EnvSchema>;

export function loadEnv(env: NodeJS.ProcessEnv = process.env): ServerEnv {
  return EnvSchema.parse(env);
}
