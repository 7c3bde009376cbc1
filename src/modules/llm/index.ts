/**
 * LLM Module - Public API
 */

export {
  createEmptyCompletionError,
  createMalformedCompletionError,
  type CompletionError,
  type EmptyCompletionError,
  type MalformedCompletionError,
} from './core/errors.js';

export type { CompletionProvider } from './core/ports.js';

export { extractJson } from './core/json.js';

export { completeWithin } from './core/complete.js';

export { isTransientNetworkError, retryOnceIfTransient } from './core/transient.js';

export {
  makeLangChainCompletionProvider,
  makeOpenAIChatModel,
  type LangChainCompletionOptions,
  type OpenAIChatModelOptions,
} from './shell/langchain-completion.js';
