import { describe, it, expect, vi } from "vitest";

vi.mock("@langchain/openai", () => ({
  OpenAIEmbeddings: vi.fn(() => ({
    embedQuery: vi.fn(),
    embedDocuments: vi.fn(),
  })),
}));

import { OpenAIEmbeddings } from "@langchain/openai";
import { CircuitBreakerError } from "@docqa/shared";
import { ProtectedOpenAIEmbeddings } from "./embeddingsService.js";

function makeClient() {
  return {
    embedQuery: vi.fn().mockResolvedValue([0.1, 0.2]),
    embedDocuments: vi.fn().mockResolvedValue([[1, 0], [0, 1]]),
  };
}

describe("ProtectedOpenAIEmbeddings", () => {
  it("configures the OpenAI client from the model config", () => {
    new ProtectedOpenAIEmbeddings({ apiKey: "test-key" });

    expect(OpenAIEmbeddings).toHaveBeenCalledWith({
      model: "text-embedding-3-small",
      dimensions: 1536,
      apiKey: "test-key",
    });
  });

  it("routes queries and documents through the client", async () => {
    const client = makeClient();
    const embeddings = new ProtectedOpenAIEmbeddings({ client });

    await expect(embeddings.embedQuery("hello")).resolves.toEqual([0.1, 0.2]);
    await expect(embeddings.embedDocuments(["a", "b"])).resolves.toEqual([
      [1, 0],
      [0, 1],
    ]);
    expect(client.embedQuery).toHaveBeenCalledWith("hello");
    expect(client.embedDocuments).toHaveBeenCalledWith(["a", "b"]);
  });

  it("opens the circuit after three consecutive failures", async () => {
    const client = makeClient();
    client.embedQuery.mockRejectedValue(new Error("upstream down"));
    const embeddings = new ProtectedOpenAIEmbeddings({ client });

    for (let i = 0; i < 3; i++) {
      await expect(embeddings.embedQuery("q")).rejects.toThrow("upstream down");
    }

    await expect(embeddings.embedQuery("q")).rejects.toBeInstanceOf(
      CircuitBreakerError,
    );
    expect(embeddings.getCircuitMetrics().state).toBe("open");
  });

  it("does not count quota errors as failures", async () => {
    const client = makeClient();
    client.embedQuery.mockRejectedValue(new Error("insufficient_quota"));
    const embeddings = new ProtectedOpenAIEmbeddings({ client });

    for (let i = 0; i < 4; i++) {
      await expect(embeddings.embedQuery("q")).rejects.toThrow(
        "insufficient_quota",
      );
    }

    expect(embeddings.getCircuitMetrics().state).toBe("closed");
  });
});
