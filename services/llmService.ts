import { GoogleGenAI, type Schema } from '@google/genai';
import { appConfig } from './config';
import { logger } from './logger';
import { executeWithResilience } from './resilience';

export type ResponseSchema = Schema;

export interface GenerateRequest {
  systemInstruction: string;
  prompt: string;
  schema?: ResponseSchema;
  model?: string;
  correlationId?: string;
}

let geminiClient: GoogleGenAI | null = null;

const ensureGeminiClient = (): GoogleGenAI => {
  if (!appConfig.gemini.apiKey) {
    throw new Error('GEMINI_API_KEY is not configured');
  }
  if (!geminiClient) {
    geminiClient = new GoogleGenAI({ apiKey: appConfig.gemini.apiKey });
  }
  return geminiClient;
};

export const resetGeminiClient = () => {
  geminiClient = null;
};

/**
 * Single Gemini call at temperature 0. With a schema the model is asked for JSON and the raw JSON text is returned.
 */
export async function generateText(request: GenerateRequest): Promise<string> {
  const client = ensureGeminiClient();
  const model = request.model ?? appConfig.gemini.model;

  const text = await executeWithResilience('llm', 'gemini.generateContent', async () => {
    const response = await client.models.generateContent({
      model,
      contents: request.prompt,
      config: {
        systemInstruction: request.systemInstruction,
        temperature: 0,
        ...(request.schema ? { responseMimeType: 'application/json', responseSchema: request.schema } : {}),
      },
    });
    return response.text ?? '';
  }, { correlationId: request.correlationId, attributes: { model } });

  logger.log('LlmService', 'INFO', 'Resposta do modelo recebida.', { model, length: text.length }, {
    correlationId: request.correlationId,
    scope: 'llm',
  });
  return text;
}
