import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { AIMessage, HumanMessage } from "@langchain/core/messages";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { CircuitBreakerError, RequestAbortedError } from "@docqa/shared";
import {
  createLlmCircuit,
  extractTextFromResponse,
  invokeLlm,
  isTransientError,
  withSingleRetry,
} from "./llmService.js";

function makeModel(invoke: ReturnType<typeof vi.fn>): BaseChatModel {
  return { invoke } as unknown as BaseChatModel;
}

// ---------------------------------------------------------------------------
// isTransientError
// ---------------------------------------------------------------------------

describe("isTransientError", () => {
  it("returns false for CircuitBreakerError", () => {
    expect(isTransientError(new CircuitBreakerError("llm"))).toBe(false);
  });

  it("returns false for caller aborts", () => {
    expect(isTransientError(new RequestAbortedError("llm"))).toBe(false);
  });

  it("returns true for network errors", () => {
    expect(isTransientError(new Error("ECONNRESET"))).toBe(true);
    expect(isTransientError(new Error("socket hang up"))).toBe(true);
    expect(isTransientError(new Error("request timeout"))).toBe(true);
  });

  it("returns true for retryable HTTP codes in the message", () => {
    expect(isTransientError(new Error("Rate limited: 429"))).toBe(true);
    expect(isTransientError(new Error("Overloaded 529"))).toBe(true);
  });

  it("reads status and statusCode properties", () => {
    expect(isTransientError(Object.assign(new Error("x"), { status: 503 }))).toBe(
      true,
    );
    expect(
      isTransientError(Object.assign(new Error("x"), { statusCode: 400 })),
    ).toBe(false);
  });

  it("returns false for non-transient errors and non-Error values", () => {
    expect(isTransientError(new Error("Invalid API key"))).toBe(false);
    expect(isTransientError("string error")).toBe(false);
    expect(isTransientError(null)).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// withSingleRetry
// ---------------------------------------------------------------------------

describe("withSingleRetry", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the first result without retrying", async () => {
    const fn = vi.fn().mockResolvedValue("ok");

    await expect(withSingleRetry(fn, "test")).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries once after a transient error", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error("ECONNRESET"))
      .mockResolvedValueOnce("recovered");

    const promise = withSingleRetry(fn, "test");
    await vi.advanceTimersByTimeAsync(1_000);

    await expect(promise).resolves.toBe("recovered");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("rethrows non-transient errors immediately", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("Invalid API key"));

    await expect(withSingleRetry(fn, "test")).rejects.toThrow("Invalid API key");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("does not retry once the signal has aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn().mockRejectedValue(new Error("ECONNRESET"));

    await expect(withSingleRetry(fn, "test", controller.signal)).rejects.toThrow(
      "ECONNRESET",
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

// ---------------------------------------------------------------------------
// extractTextFromResponse
// ---------------------------------------------------------------------------

describe("extractTextFromResponse", () => {
  it("returns string content as-is", () => {
    expect(extractTextFromResponse(new AIMessage("plain text"))).toBe(
      "plain text",
    );
  });

  it("joins text blocks and skips other block types", () => {
    const message = new AIMessage({
      content: [
        { type: "text", text: "first " },
        { type: "image_url", image_url: "http://example.test/a.png" },
        { type: "text", text: "second" },
      ],
    });

    expect(extractTextFromResponse(message)).toBe("first second");
  });
});

// ---------------------------------------------------------------------------
// invokeLlm
// ---------------------------------------------------------------------------

describe("invokeLlm", () => {
  it("invokes the model with the circuit's signal", async () => {
    const invoke = vi.fn().mockResolvedValue(new AIMessage("answer"));
    const messages = [new HumanMessage("question")];

    const result = await invokeLlm(
      createLlmCircuit(5_000),
      makeModel(invoke),
      messages,
    );

    expect(extractTextFromResponse(result)).toBe("answer");
    expect(invoke).toHaveBeenCalledWith(messages, {
      signal: expect.any(AbortSignal),
    });
  });

  it("rejects without calling the model when the circuit is open", async () => {
    const invoke = vi.fn();
    const circuit = createLlmCircuit(5_000);
    circuit.trip();

    await expect(
      invokeLlm(circuit, makeModel(invoke), [new HumanMessage("q")]),
    ).rejects.toBeInstanceOf(CircuitBreakerError);
    expect(invoke).not.toHaveBeenCalled();
  });

  it("rejects with RequestAbortedError when the caller aborts", async () => {
    const controller = new AbortController();
    controller.abort();
    const invoke = vi.fn().mockResolvedValue(new AIMessage("late"));

    await expect(
      invokeLlm(createLlmCircuit(5_000), makeModel(invoke), [], {
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(RequestAbortedError);
  });
});
