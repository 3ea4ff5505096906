export {
  buildExpansionPrompt,
  buildMultiQueryPrompt,
  buildRewritePrompt,
  buildSynonymPrompt,
  type ExpansionPrompt,
} from "./queryExpansion.js";
