import { z } from 'zod';
import { BaseLLMProcessor, VisionPrompt } from "./BaseLLMProcessor.js";
import { DecisionError } from '../shared/errors.js';
import { Logger } from '../../utils/logger.js';

export interface OpenAISettings {
  /** e.g. https://api.openai.com/v1, or an Ollama host's /v1 */
  baseUrl: string;
  /** Omitted for local servers that take no credentials */
  apiKey?: string;
  model: string;
  temperature: number;
  historyWindow?: number;
}

const chatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() })
  })).optional(),
  error: z.object({ message: z.string() }).optional()
});

/**
 * Talks to any OpenAI-compatible chat completions endpoint that accepts image
 * parts.
 */
export class OpenAIProcessor extends BaseLLMProcessor {
  constructor(private readonly settings: OpenAISettings, logger: Logger) {
    super(logger, settings.historyWindow);
  }

  protected async processPrompt(request: VisionPrompt): Promise<string> {
    const payload = {
      model: this.settings.model,
      temperature: this.settings.temperature,
      messages: [
        { role: "system", content: request.systemPrompt },
        {
          role: "user",
          content: [
            { type: "text", text: request.prompt },
            { type: "image_url", image_url: { url: `data:image/png;base64,${request.screenshotBase64}` } }
          ]
        }
      ]
    };

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.settings.apiKey) {
      headers['Authorization'] = `Bearer ${this.settings.apiKey}`;
    }

    this.logger.info('LLM request sent', {
      provider: this.constructor.name,
      model: this.settings.model,
      promptLength: request.prompt.length
    });

    const result = await fetch(`${this.settings.baseUrl}/chat/completions`, {
      method: 'POST',
      headers,
      body: JSON.stringify(payload)
    });

    const body: unknown = await result.json().catch(() => null);
    const parsed = chatCompletionSchema.safeParse(body);

    if (!result.ok || !parsed.success || parsed.data.error) {
      const detail = parsed.success && parsed.data.error ? parsed.data.error.message : result.statusText;
      throw new DecisionError(`Chat completion request failed (${result.status}): ${detail}`);
    }

    const content = parsed.data.choices?.[0]?.message.content;
    if (!content) {
      throw new DecisionError('Chat completion response contained no message content');
    }

    this.logger.info('LLM response received', { responseLength: content.length });
    return content;
  }
}
