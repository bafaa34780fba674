import { AnthropicVertex } from '@anthropic-ai/vertex-sdk';
import OpenAI from 'openai';
import { Provider } from '../../config/validation';
import { Logger } from '../../core/services/Logger';
import { TextGenerator } from '../../core/services/TextGenerator';
import { OpenAIGenerator } from './OpenAIGenerator';
import { VertexClaudeGenerator } from './VertexClaudeGenerator';

export type GeneratorSettings = {
  provider: Provider;
  model: string;
  maxTokens: number;
  projectId?: string;
  region: string;
  openaiApiKey?: string;
  openaiBaseUrl: string;
};

// Builds the one client handle a run shares across all slokas.
export function createGenerator(settings: GeneratorSettings, logger: Logger): TextGenerator {
  if (settings.provider === 'openai') {
    if (!settings.openaiApiKey) {
      throw new Error('OPENAI_API_KEY environment variable is required for the openai provider');
    }
    const client = new OpenAI({ apiKey: settings.openaiApiKey, baseURL: settings.openaiBaseUrl });
    return new OpenAIGenerator(client, settings.model, logger, { maxTokens: settings.maxTokens });
  }

  if (!settings.projectId) {
    throw new Error('A Google Cloud project ID is required for the vertex provider');
  }
  const client = new AnthropicVertex({ projectId: settings.projectId, region: settings.region });
  return new VertexClaudeGenerator(client, settings.model, logger, { maxTokens: settings.maxTokens });
}
