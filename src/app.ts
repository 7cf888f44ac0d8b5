import Fastify, { type FastifyInstance } from "fastify";
import fastifyStatic from "@fastify/static";
import fastifyCors from "@fastify/cors";
import fastifySwagger from "@fastify/swagger";
import fastifySwaggerUi from "@fastify/swagger-ui";
import { jsonSchemaTransform } from "fastify-type-provider-zod";
import { fileURLToPath } from "node:url";
import { registerRoutes, type RouteDeps } from "./routes.js";
import type { ServerEnv } from "./config.js";

export const publicDir = fileURLToPath(new URL("../public", import.meta.url));

export function createApp(env: Pick<ServerEnv, "LOG_LEVEL">): FastifyInstance {
  return Fastify({ logger: { level: env.LOG_LEVEL } });
}

export async function configureApp(app: FastifyInstance, deps: RouteDeps) {
  // CORS
  await app.register(fastifyCors, { origin: true });

  // Swagger
  await app.register(fastifySwagger, {
    openapi: {
      info: {
        title: "Grid Snake",
        description: "Single-player snake on a 30x20 grid, played in the browser",
        version: "1.0.0",
      },
      tags: [
        { name: "game", description: "Game state and settings" },
        { name: "input", description: "Keyboard input over HTTP" },
      ],
    },
    transform: jsonSchemaTransform,
  });

  await app.register(fastifySwaggerUi, {
    routePrefix: "/docs",
  });

  // Routes (must be registered before static files)
  await registerRoutes(app, deps);

  // Static files (wildcard false so API routes take priority)
  await app.register(fastifyStatic, {
    root: publicDir,
    prefix: "/",
    wildcard: false,
  });
}
