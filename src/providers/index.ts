export * from "./withTimeout";
export * from "./registry";
export { MockEmbeddingProvider } from "./mock/mockEmbeddingProvider";
export {
  MockCompletionProvider,
  type CompletionResponder,
} from "./mock/mockCompletionProvider";
export { OpenAIEmbeddingProvider } from "./openai/openaiEmbeddingProvider";
export { OpenAICompletionProvider } from "./openai/openaiCompletionProvider";
