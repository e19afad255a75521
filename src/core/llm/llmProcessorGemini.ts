import { GenerativeModel, GoogleGenerativeAI } from "@google/generative-ai";
import { BaseLLMProcessor, VisionPrompt } from "./BaseLLMProcessor.js";
import { DecisionError } from '../shared/errors.js';
import { Logger } from '../../utils/logger.js';

export interface GeminiSettings {
  apiKey: string;
  model: string;
  temperature: number;
  historyWindow?: number;
}

export class GeminiProcessor extends BaseLLMProcessor {
  private readonly model: GenerativeModel;

  constructor(private readonly settings: GeminiSettings, logger: Logger, genAI?: GoogleGenerativeAI) {
    super(logger, settings.historyWindow);
    const client = genAI ?? new GoogleGenerativeAI(settings.apiKey);
    this.model = client.getGenerativeModel({
      model: settings.model,
      systemInstruction: this.getSystemPrompt(),
      generationConfig: {
        responseMimeType: "application/json",
        temperature: settings.temperature
      }
    });
  }

  protected async processPrompt(request: VisionPrompt): Promise<string> {
    this.logger.info('LLM request sent', {
      provider: this.constructor.name,
      model: this.settings.model,
      promptLength: request.prompt.length
    });

    const result = await this.model.generateContent([
      { text: request.prompt },
      { inlineData: { mimeType: "image/png", data: request.screenshotBase64 } }
    ]);

    const responseText = result.response.text();
    if (!responseText) {
      throw new DecisionError('Gemini response contained no text');
    }

    this.logger.info('LLM response received', { responseLength: responseText.length });
    return responseText;
  }
}
