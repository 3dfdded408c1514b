export { LLMClient } from "./client.js";
export type { GenerateOptions, ObjectResult, StructuredGenerator } from "./client.js";
export { resolveLanguageModel } from "./resolve.js";
