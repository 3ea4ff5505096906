import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("@langchain/anthropic", () => ({
  ChatAnthropic: vi.fn(() => ({ provider: "anthropic" })),
}));
vi.mock("@langchain/openai", () => ({
  ChatOpenAI: vi.fn(() => ({ provider: "openai" })),
}));
vi.mock("@langchain/google-genai", () => ({
  ChatGoogleGenerativeAI: vi.fn(() => ({ provider: "google" })),
}));

import { ChatAnthropic } from "@langchain/anthropic";
import { ChatOpenAI } from "@langchain/openai";
import { ChatGoogleGenerativeAI } from "@langchain/google-genai";
import { createChatModel, createExpansionModel } from "./modelFactory.js";

describe("createChatModel", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    delete process.env.EXPANSION_PROVIDER;
    delete process.env.EXPANSION_MODEL;
  });

  it("builds an Anthropic model by default", () => {
    createChatModel({
      provider: "anthropic",
      model: "claude-test",
      temperature: 0,
      maxTokens: 256,
    });

    expect(ChatAnthropic).toHaveBeenCalledWith({
      model: "claude-test",
      temperature: 0,
      maxTokens: 256,
    });
  });

  it("builds an OpenAI model", () => {
    createChatModel({ provider: "openai", model: "gpt-test" });

    expect(ChatOpenAI).toHaveBeenCalledWith({ model: "gpt-test" });
  });

  it("maps maxTokens to maxOutputTokens for Google", () => {
    createChatModel({ provider: "google", model: "gemini-test", maxTokens: 100 });

    expect(ChatGoogleGenerativeAI).toHaveBeenCalledWith({
      model: "gemini-test",
      maxOutputTokens: 100,
    });
  });

  it("builds the expansion model from the environment", () => {
    process.env.EXPANSION_PROVIDER = "openai";
    process.env.EXPANSION_MODEL = "gpt-expand";

    createExpansionModel();

    expect(ChatOpenAI).toHaveBeenCalledWith({
      model: "gpt-expand",
      temperature: 0,
      maxTokens: 512,
    });
  });

  it("rejects an unknown provider", () => {
    process.env.EXPANSION_PROVIDER = "mystery";

    expect(() => createExpansionModel()).toThrow(
      'Invalid EXPANSION_PROVIDER: "mystery". Expected anthropic, openai or google.',
    );
  });
});
