import { z } from "zod";
import { NotFoundError, logger, toError } from "@docqa/shared";
import { toTrpcError } from "../errors.js";
import { router, protectedProcedure } from "../trpc.js";

const log = logger.child({ service: "passages-router" });

const PASSAGE_LOOKUP_FAILED = "Passage lookup failed unexpectedly.";

export const passagesRouter = router({
  getById: protectedProcedure
    .input(z.object({ id: z.string().min(1) }))
    .query(async ({ ctx, input }) => {
      try {
        const passage = await ctx.services.passages.getById(input.id);
        if (!passage) {
          throw new NotFoundError(`Passage "${input.id}" not found.`);
        }
        return passage;
      } catch (error) {
        const cause = toError(error);
        if (!(cause instanceof NotFoundError)) {
          log.error("Passage lookup failed", {
            requestId: ctx.requestId,
            error: cause.message,
          });
        }
        throw toTrpcError(cause, PASSAGE_LOOKUP_FAILED);
      }
    }),

  getMany: protectedProcedure
    .input(z.object({ ids: z.array(z.string().min(1)).min(1).max(100) }))
    .query(async ({ ctx, input }) => {
      try {
        return await ctx.services.passages.getPassages(input.ids);
      } catch (error) {
        const cause = toError(error);
        log.error("Passage lookup failed", {
          requestId: ctx.requestId,
          error: cause.message,
        });
        throw toTrpcError(cause, PASSAGE_LOOKUP_FAILED);
      }
    }),
});
