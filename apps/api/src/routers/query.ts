import { z } from "zod";
import { logger, toError } from "@docqa/shared";
import { toTrpcError } from "../errors.js";
import { router, protectedProcedure } from "../trpc.js";

const log = logger.child({ service: "query-router" });

export const retrieveInput = z.object({
  query: z.string().trim().min(1).max(4000),
  useExpansion: z.boolean().default(false),
  strategy: z.enum(["multi", "rewrite", "synonyms"]).optional(),
  language: z.string().min(2).max(16).optional(),
});

export const queryRouter = router({
  retrieve: protectedProcedure
    .input(retrieveInput)
    .mutation(async ({ ctx, input }) => {
      try {
        const outcome = await ctx.services.retrieval.run(
          { text: input.query, language: input.language },
          input.useExpansion,
          {
            strategy: input.strategy,
            language: input.language,
            signal: ctx.signal,
            requestId: ctx.requestId,
          },
        );
        return {
          ...outcome.bundle,
          reranked: outcome.reranked,
          degradations: outcome.degradations,
        };
      } catch (error) {
        const cause = toError(error);
        log.error("Retrieve failed", {
          requestId: ctx.requestId,
          error: cause.message,
          errorName: cause.name,
        });
        throw toTrpcError(cause, "Retrieval failed unexpectedly.");
      }
    }),
});
