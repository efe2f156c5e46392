// Generation client — the one call shape used for both text enrichment and
// answer generation. Anthropic Messages API behind a small interface so the
// agent and synthesizer can be driven by fakes.

import Anthropic from '@anthropic-ai/sdk';
import { ExternalServiceError, errorMessage } from '../utils/errors.js';

export interface CompletionRequest {
  system?: string;
  prompt: string;
  temperature: number;
  maxTokens: number;
}

export interface GenerationClient {
  complete(request: CompletionRequest): Promise<string>;
}

export interface AnthropicClientConfig {
  apiKey: string;
  model: string;
}

export class AnthropicGenerationClient implements GenerationClient {
  private client: Anthropic;

  constructor(private readonly config: AnthropicClientConfig) {
    this.client = new Anthropic({ apiKey: config.apiKey });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.messages
      .create({
        model: this.config.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
      })
      .catch((err: unknown) => {
        throw new ExternalServiceError('generation', `Generation request failed: ${errorMessage(err)}`, err);
      });

    const text = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();
    if (!text) {
      throw new ExternalServiceError('generation', 'Generation returned no text content');
    }
    return text;
  }
}
