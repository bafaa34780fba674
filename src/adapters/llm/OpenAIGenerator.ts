// OpenAI-compatible TextGenerator using the Responses API.
// Note: requires OPENAI_API_KEY (and optionally OPENAI_BASE_URL) at runtime.

import { TextGenerator } from '../../core/services/TextGenerator';
import { Logger } from '../../core/services/Logger';
import { DEFAULT_MAX_TOKENS } from './defaults';

// The slice of the OpenAI client this generator calls
export interface ResponsesClient {
  responses: {
    create(params: {
      model: string;
      input: string;
      max_output_tokens: number;
    }): Promise<{
      status?: string;
      incomplete_details?: { reason?: string } | null;
      output_text: string;
    }>;
  };
}

export class OpenAIGenerator implements TextGenerator {
  constructor(
    private client: ResponsesClient,
    public readonly model: string,
    private logger: Logger,
    private options: { maxTokens?: number } = {}
  ) {}

  async generate(prompt: string): Promise<string> {
    const maxTokens = this.options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.logger.debug(`Model: ${this.model}, Max tokens: ${maxTokens}`);

    const startTime = Date.now();
    const res = await this.client.responses.create({
      model: this.model,
      input: prompt,
      max_output_tokens: maxTokens,
    });
    this.logger.debug(`OpenAI response received in ${Date.now() - startTime}ms (status: ${res.status ?? 'unknown'})`);

    if (res.status === 'incomplete' && res.incomplete_details?.reason === 'max_output_tokens') {
      this.logger.warn(`Response hit the ${maxTokens} token limit and may be truncated`);
    }

    const text = res.output_text.trim();
    if (!text) {
      throw new Error('Model response contained no output text');
    }
    return text;
  }
}
