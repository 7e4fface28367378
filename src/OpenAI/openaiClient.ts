import OpenAI from "openai";
import type { AppConfig } from "../config";

/**
 * The generative-model capability the quiz pipeline depends on: one prompt
 * in, one completion out.
 */
export interface CompletionModel {
  complete(prompt: string, temperature: number): Promise<string>;
}

export const createOpenAIClient = (config: Pick<AppConfig, "openaiApiKey">) =>
  new OpenAI({ apiKey: config.openaiApiKey });

export class OpenAICompletionModel implements CompletionModel {
  constructor(
    private readonly openai: OpenAI,
    private readonly model: string
  ) {}

  async complete(prompt: string, temperature: number): Promise<string> {
    const response = await this.openai.chat.completions.create({
      model: this.model,
      temperature,
      stream: false,
      messages: [{ role: "user", content: prompt }],
    });

    return response.choices?.[0]?.message?.content || "";
  }
}
