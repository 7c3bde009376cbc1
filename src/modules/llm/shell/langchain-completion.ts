/**
 * LangChain completion adapter.
 *
 * Any LangChain chat model can back the CompletionProvider port; production
 * wiring uses ChatOpenAI, tests use the fake chat models from @langchain/core.
 */

import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import { StringOutputParser } from '@langchain/core/output_parsers';
import { ChatOpenAI } from '@langchain/openai';
import { err, ok } from 'neverthrow';

import { createProviderError, describeError } from '../../../common/types/errors.js';
import { createEmptyCompletionError } from '../core/errors.js';
import { isTransientNetworkError, retryOnceIfTransient } from '../core/transient.js';

import type { CompletionProvider } from '../core/ports.js';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { Logger } from 'pino';

export interface LangChainCompletionOptions {
  model: BaseChatModel;
  logger: Logger;
}

export const makeLangChainCompletionProvider = (
  options: LangChainCompletionOptions
): CompletionProvider => {
  const log = options.logger.child({ component: 'CompletionProvider' });
  const chain = options.model.pipe(new StringOutputParser());

  return {
    async complete(prompt, systemInstructions) {
      const messages = [new SystemMessage(systemInstructions), new HumanMessage(prompt)];

      let text: string;
      try {
        text = await retryOnceIfTransient(() => chain.invoke(messages), log, 'complete');
      } catch (error) {
        log.error({ err: error, promptLength: prompt.length }, 'Completion provider failed');
        return err(
          createProviderError(
            'completion',
            `Completion provider failed: ${describeError(error)}`,
            error,
            isTransientNetworkError(error)
          )
        );
      }

      if (text.trim() === '') {
        log.warn({ promptLength: prompt.length }, 'Empty completion');
        return err(createEmptyCompletionError());
      }
      return ok(text);
    },
  };
};

export interface OpenAIChatModelOptions {
  model: string;
  apiKey?: string | undefined;
  baseUrl?: string | undefined;
}

/**
 * ChatOpenAI configured for deterministic answers; retries are left to the
 * single transient reissue above.
 */
export const makeOpenAIChatModel = (options: OpenAIChatModelOptions): ChatOpenAI =>
  new ChatOpenAI({
    model: options.model,
    temperature: 0,
    maxRetries: 0,
    ...(options.apiKey !== undefined && { apiKey: options.apiKey }),
    ...(options.baseUrl !== undefined && { configuration: { baseURL: options.baseUrl } }),
  });
