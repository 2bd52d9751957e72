import { ChatAnthropic } from '@langchain/anthropic';
import { BaseLanguageModelInput } from '@langchain/core/language_models/base';
import { AIMessageChunk } from '@langchain/core/messages';
import { Runnable } from '@langchain/core/runnables';
import { StructuredToolInterface } from '@langchain/core/tools';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatOllama } from '@langchain/ollama';
import { ChatOpenAI } from '@langchain/openai';
import { Logger } from '@nestjs/common';
import { AgentConfig } from '../../config/agent-config';

export type ToolCallingModel = Runnable<BaseLanguageModelInput, AIMessageChunk>;

const logger = new Logger('ChatModelFactory');

/**
 * Create the configured provider's chat model with the agent's tools bound.
 *
 * Credentials were validated when the configuration was loaded.
 */
export function createToolCallingModel(
  config: AgentConfig,
  tools: StructuredToolInterface[],
): ToolCallingModel {
  const { name, apiKey, baseUrl } = config.model;

  switch (config.aiProvider) {
    case 'anthropic':
      logger.debug(`Using Anthropic model: ${name}`);
      return new ChatAnthropic({ apiKey, model: name, temperature: 0 }).bindTools(tools);

    case 'openai':
      logger.debug(`Using OpenAI model: ${name}`);
      return new ChatOpenAI({ apiKey, model: name, temperature: 0 }).bindTools(tools);

    case 'ollama':
      logger.debug(`Using Ollama model: ${name} at ${baseUrl}`);
      return new ChatOllama({ baseUrl, model: name, temperature: 0 }).bindTools(tools);

    case 'gemini':
      logger.debug(`Using Gemini model: ${name}`);
      return new ChatGoogleGenerativeAI({
        apiKey,
        model: name,
        temperature: 0,
      }).bindTools(tools);
  }
}
