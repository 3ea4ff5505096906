export {
  createLlmCircuit,
  invokeLlm,
  extractTextFromResponse,
  isTransientError,
  withSingleRetry,
  type InvokeLlmOptions,
} from "./llmService.js";

export {
  ProtectedOpenAIEmbeddings,
  createProtectedEmbeddings,
  type EmbeddingsLike,
  type ProtectedEmbeddingsOptions,
} from "./embeddingsService.js";

export { createIndexReadCircuit } from "./vectorStoreService.js";

export {
  CrossEncoderClient,
  type CrossEncoderClientOptions,
} from "./rerankerService.js";
