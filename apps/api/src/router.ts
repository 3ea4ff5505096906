import { router } from "./trpc.js";
import { healthRouter } from "./routers/health.js";
import { passagesRouter } from "./routers/passages.js";
import { queryRouter } from "./routers/query.js";

export const appRouter = router({
  query: queryRouter,
  passages: passagesRouter,
  health: healthRouter,
});

export type AppRouter = typeof appRouter;
