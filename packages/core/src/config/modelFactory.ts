import { ChatAnthropic } from "@langchain/anthropic";
import { ChatOpenAI } from "@langchain/openai";
import { ChatGoogleGenerativeAI } from "@langchain/google-genai";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { getModelConfig, type ChatModelConfig } from "./models.js";

/**
 * Creates a chat model instance based on the provider in the config.
 *
 * Supports "anthropic" (default), "openai", and "google" providers.
 * Only this function (and this file) imports concrete provider classes.
 */
export function createChatModel(config: ChatModelConfig): BaseChatModel {
  switch (config.provider) {
    case "openai":
      return new ChatOpenAI({
        model: config.model,
        ...(config.temperature !== undefined && {
          temperature: config.temperature,
        }),
        ...(config.maxTokens !== undefined && { maxTokens: config.maxTokens }),
      });
    case "google":
      return new ChatGoogleGenerativeAI({
        model: config.model,
        ...(config.temperature !== undefined && {
          temperature: config.temperature,
        }),
        ...(config.maxTokens !== undefined && {
          maxOutputTokens: config.maxTokens,
        }),
      });
    case "anthropic":
    default:
      return new ChatAnthropic({
        model: config.model,
        ...(config.temperature !== undefined && {
          temperature: config.temperature,
        }),
        ...(config.maxTokens !== undefined && { maxTokens: config.maxTokens }),
      });
  }
}

/**
 * Creates the model used for query expansion. Call once at startup and
 * pass it into the expander.
 */
export function createExpansionModel(): BaseChatModel {
  return createChatModel(getModelConfig().expansion);
}
