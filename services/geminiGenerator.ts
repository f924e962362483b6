import { GoogleGenAI } from "@google/genai";
import type { GenerationData } from "../types.js";
import type { GenerateParams } from "./generationProtocol.js";
import type { TextGenerator } from "./generationServer.js";

/**
 * Backs the generation service with Gemini. Requested model names that are
 * not Gemini models (the clients default to an OpenAI name) fall back to
 * the configured model.
 */
export class GeminiTextGenerator implements TextGenerator {
  private readonly client: GoogleGenAI;

  constructor(apiKey: string, private readonly defaultModel: string) {
    this.client = new GoogleGenAI({ apiKey });
  }

  resolveModel(requested: string): string {
    return /^(models\/)?gemini/i.test(requested) ? requested : this.defaultModel;
  }

  async generate(params: GenerateParams): Promise<GenerationData> {
    const model = this.resolveModel(params.model);
    const prompt =
      params.format === "markdown"
        ? `${params.prompt}\n\nRespond in Markdown.`
        : params.prompt;

    const result = await this.client.models.generateContent({
      model,
      contents: [
        {
          role: "user",
          parts: [{ text: prompt }]
        }
      ],
      config: {
        systemInstruction: params.system,
        temperature: params.temperature
      }
    });

    const text = result.text ?? "";
    if (!text) {
      throw new Error("Empty Gemini response text");
    }

    const usage = result.usageMetadata;
    return {
      text,
      usage: {
        model,
        prompt_tokens: usage?.promptTokenCount ?? 0,
        completion_tokens: usage?.candidatesTokenCount ?? 0,
        total_tokens: usage?.totalTokenCount ?? 0
      }
    };
  }
}
