export {
  MODEL_CONFIG,
  getModelConfig,
  type ModelConfig,
  type ModelProvider,
  type ChatModelConfig,
} from "./models.js";
export {
  RETRIEVAL_CONFIG,
  getRetrievalConfig,
  type RetrievalConfig,
} from "./settings.js";
export { createChatModel, createExpansionModel } from "./modelFactory.js";
