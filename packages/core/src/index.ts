export * from "./domain/Knowledge.js";
export * from "./domain/Chat.js";
export * from "./domain/errors.js";
export * from "./ports/index.js";
export * from "./knowledge/schema.js";
export * from "./knowledge/KnowledgeStore.js";
export * from "./knowledge/provider.js";
export * from "./matching/similarity.js";
export * from "./matching/matcher.js";
export * from "./responder/composeAnswer.js";
export * from "./responder/prompt.js";
export * from "./responder/rewrite.js";
export * from "./responder/createResponder.js";
export * from "./config/config.js";
export * from "./telemetry/logger.js";
