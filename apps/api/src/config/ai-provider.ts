/**
 * AI Provider Factory
 * Builds the chat model used for price discovery from `AppConfig.ai`.
 */

import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatOllama } from '@langchain/ollama';
import { ChatOpenAI } from '@langchain/openai';
import { ChatAnthropic } from '@langchain/anthropic';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { AiConfig } from './app-config.js';

const TEMPERATURE = 0.2;

export function createAiModel(ai: AiConfig): BaseChatModel {
  const apiKey = ai.apiKey ?? undefined;

  switch (ai.provider) {
    case 'openai':
      return new ChatOpenAI({ model: ai.model, apiKey, temperature: TEMPERATURE });

    case 'claude':
      return new ChatAnthropic({ model: ai.model, apiKey, temperature: TEMPERATURE });

    case 'ollama':
      return new ChatOllama({ baseUrl: ai.ollamaBaseUrl, model: ai.model, temperature: TEMPERATURE });

    case 'gemini':
    default:
      return new ChatGoogleGenerativeAI({ model: ai.model, apiKey, temperature: TEMPERATURE });
  }
}

/** Tag stored with each cached valuation, e.g. `gemini:gemini-2.0-flash`. */
export function aiModelTag(ai: AiConfig): string {
  return `${ai.provider}:${ai.model}`;
}
