import { router, publicProcedure } from "../trpc.js";

export const API_VERSION = "0.1.0";

export const healthRouter = router({
  check: publicProcedure.query(({ ctx }) => {
    const circuits = ctx.services.circuitMetrics();

    const anyCircuitOpen = Object.values(circuits).some(
      (m) => m.state === "open",
    );

    return {
      status: anyCircuitOpen ? "degraded" : "ok",
      timestamp: new Date().toISOString(),
      version: API_VERSION,
      pool: ctx.services.poolStatus(),
      circuits,
    };
  }),
});
