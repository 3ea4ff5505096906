import { Hono } from "hono";
import { cors } from "hono/cors";
import { fetchRequestHandler } from "@trpc/server/adapters/fetch";
import { getOptionalEnv, logger } from "@docqa/shared";
import { appRouter } from "./router.js";
import { createContext } from "./trpc.js";
import type { ApiServices } from "./services.js";

const log = logger.child({ service: "api" });

export function createApp(services: ApiServices): Hono {
  const app = new Hono();

  app.use(
    "*",
    cors({
      origin: getOptionalEnv("ALLOWED_ORIGIN", "http://localhost:3000"),
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization", "x-api-key", "x-request-id"],
      maxAge: 86400,
    }),
  );

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.all("/trpc/*", (c) =>
    fetchRequestHandler({
      endpoint: "/trpc",
      req: c.req.raw,
      router: appRouter,
      createContext: ({ req }) => createContext(services, { req }),
      onError: ({ path, error }) => {
        if (error.code === "INTERNAL_SERVER_ERROR") {
          log.error("tRPC procedure failed", {
            path,
            error: error.message,
          });
        }
      },
    }),
  );

  return app;
}
