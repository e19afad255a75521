import { DecisionMaker } from './llmProcessor.js';
import { OpenAIProcessor } from './llmProcessorOpenAI.js';
import { OllamaProcessor } from './llmProcessorOllama.js';
import { GeminiProcessor } from './llmProcessorGemini.js';
import { ConfigError } from '../shared/errors.js';
import { LlmSettings } from '../../config.js';
import { Logger } from '../../utils/logger.js';

export type { DecisionMaker } from './llmProcessor.js';

export function createDecisionMaker(settings: LlmSettings, logger: Logger): DecisionMaker {
  logger.info('Using LLM provider', { provider: settings.provider, model: settings.model });

  switch (settings.provider) {
    case 'openai':
      if (!settings.openaiApiKey) {
        throw new ConfigError('OPENAI_API_KEY is required when LLM_PROVIDER is openai');
      }
      return new OpenAIProcessor({
        baseUrl: settings.openaiBaseUrl,
        apiKey: settings.openaiApiKey,
        model: settings.model,
        temperature: settings.temperature,
        historyWindow: settings.historyWindow
      }, logger);
    case 'gemini':
      if (!settings.geminiApiKey) {
        throw new ConfigError('GEMINI_API_KEY is required when LLM_PROVIDER is gemini');
      }
      return new GeminiProcessor({
        apiKey: settings.geminiApiKey,
        model: settings.model,
        temperature: settings.temperature,
        historyWindow: settings.historyWindow
      }, logger);
    case 'ollama':
      return new OllamaProcessor({
        host: settings.ollamaHost,
        model: settings.model,
        temperature: settings.temperature,
        historyWindow: settings.historyWindow
      }, logger);
  }
}
