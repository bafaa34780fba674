// Claude on Google Vertex AI via the Messages API.
// Credentials come from Google application-default auth in the calling environment.

import { TextGenerator } from '../../core/services/TextGenerator';
import { Logger } from '../../core/services/Logger';
import { DEFAULT_MAX_TOKENS } from './defaults';

// The slice of AnthropicVertex this generator calls
export interface MessagesClient {
  messages: {
    create(params: {
      model: string;
      max_tokens: number;
      messages: Array<{ role: 'user'; content: string }>;
    }): Promise<{
      stop_reason?: string | null;
      content: Array<{ type: string; text?: string }>;
    }>;
  };
}

export class VertexClaudeGenerator implements TextGenerator {
  constructor(
    private client: MessagesClient,
    public readonly model: string,
    private logger: Logger,
    private options: { maxTokens?: number } = {}
  ) {}

  async generate(prompt: string): Promise<string> {
    const maxTokens = this.options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.logger.debug(`Model: ${this.model}, Max tokens: ${maxTokens}`);

    const startTime = Date.now();
    const message = await this.client.messages.create({
      model: this.model,
      max_tokens: maxTokens,
      messages: [{ role: 'user', content: prompt }],
    });
    this.logger.debug(`Vertex response received in ${Date.now() - startTime}ms (stop reason: ${message.stop_reason ?? 'unknown'})`);

    if (message.stop_reason === 'refusal') {
      throw new Error('Model refused to respond');
    }
    if (message.stop_reason === 'max_tokens') {
      this.logger.warn(`Response hit the ${maxTokens} token limit and may be truncated`);
    }

    const block = message.content.find((c) => c.type === 'text');
    if (!block || block.text === undefined) {
      throw new Error('Model response contained no text block');
    }
    return block.text.trim();
  }
}
