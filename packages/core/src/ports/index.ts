export type { GenerateRequest, GeneratorPort } from "./GeneratorPort.js";
export type { KnowledgeStoreProvider } from "./KnowledgeStorePort.js";
