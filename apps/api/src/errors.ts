import { TRPCError } from "@trpc/server";
import {
  NotFoundError,
  RETRIEVAL_UNAVAILABLE_MESSAGE,
  RequestAbortedError,
  RetrievalUnavailableError,
  ValidationError,
} from "@docqa/shared";

/**
 * Maps domain errors to tRPC errors. Anything unrecognised becomes
 * INTERNAL_SERVER_ERROR with `fallbackMessage`, so internal details never
 * reach the client.
 */
export function toTrpcError(error: Error, fallbackMessage: string): TRPCError {
  if (error instanceof TRPCError) {
    return error;
  }
  if (error instanceof RetrievalUnavailableError) {
    return new TRPCError({
      code: "SERVICE_UNAVAILABLE",
      message: RETRIEVAL_UNAVAILABLE_MESSAGE,
      cause: error,
    });
  }
  if (error instanceof NotFoundError) {
    return new TRPCError({
      code: "NOT_FOUND",
      message: error.message,
      cause: error,
    });
  }
  if (error instanceof ValidationError) {
    return new TRPCError({
      code: "BAD_REQUEST",
      message: error.message,
      cause: error,
    });
  }
  if (error instanceof RequestAbortedError) {
    return new TRPCError({
      code: "CLIENT_CLOSED_REQUEST",
      message: "Request was cancelled.",
      cause: error,
    });
  }
  return new TRPCError({
    code: "INTERNAL_SERVER_ERROR",
    message: fallbackMessage,
    cause: error,
  });
}
