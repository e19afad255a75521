import { OpenAIProcessor } from "./llmProcessorOpenAI.js";
import { Logger } from '../../utils/logger.js';

export interface OllamaSettings {
  host: string;
  model: string;
  temperature: number;
  historyWindow?: number;
}

/**
 * Local vision models through Ollama's OpenAI-compatible endpoint.
 */
export class OllamaProcessor extends OpenAIProcessor {
  constructor(settings: OllamaSettings, logger: Logger) {
    super(
      {
        baseUrl: `${settings.host.replace(/\/+$/, '')}/v1`,
        model: settings.model,
        temperature: settings.temperature,
        historyWindow: settings.historyWindow
      },
      logger
    );
  }
}
