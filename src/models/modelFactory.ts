import axios from 'axios';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOllama } from '@langchain/ollama';
import { ChatOpenAI } from '@langchain/openai';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { ChatModelGenerator, OllamaGenerateClient, type TextGenerator } from '../analysis/textGenerator';

// `generate` talks to the raw generate endpoint; the others go through LangChain
export const PROVIDERS = ['generate', 'ollama', 'openai', 'anthropic'] as const;
export type Provider = (typeof PROVIDERS)[number];

export interface ModelSpec {
  provider: Provider;
  model: string;
}

export const DEFAULT_MODEL: ModelSpec = {
  provider: 'generate',
  model: 'llama3'
};

function isProvider(value: string): value is Provider {
  return (PROVIDERS as readonly string[]).includes(value);
}

export function parseModelSpec(specString: string): ModelSpec {
  const parts = specString.split('/');

  // If no slash, assume the generate endpoint
  if (parts.length === 1) {
    return { provider: 'generate', model: specString };
  }

  // First part is provider, rest is model name
  const provider = parts[0] ?? '';
  if (!isProvider(provider)) {
    throw new Error(`Unsupported provider: ${provider}`);
  }
  return { provider, model: parts.slice(1).join('/') };
}

export function createChatModel(spec: ModelSpec, endpoint: string): BaseChatModel {
  switch (spec.provider) {
    case 'openai':
      return new ChatOpenAI({ model: spec.model, temperature: 0.1 });
    case 'anthropic':
      return new ChatAnthropic({ model: spec.model, temperature: 0.1 });
    case 'ollama':
      return new ChatOllama({ model: spec.model, temperature: 0.1, baseUrl: new URL(endpoint).origin });
    case 'generate':
      throw new Error('The generate provider has no chat model');
  }
}

export function createTextGenerator(spec: string | ModelSpec | undefined, endpoint: string): TextGenerator {
  let modelSpec: ModelSpec;
  if (!spec) {
    modelSpec = DEFAULT_MODEL;
  } else if (typeof spec === 'string') {
    modelSpec = parseModelSpec(spec);
  } else {
    modelSpec = spec;
  }

  if (modelSpec.provider === 'generate') {
    return new OllamaGenerateClient(axios.create(), endpoint, modelSpec.model);
  }
  return new ChatModelGenerator(createChatModel(modelSpec, endpoint));
}

export function getModelDescription(spec: ModelSpec): string {
  return `${spec.provider}/${spec.model}`;
}
