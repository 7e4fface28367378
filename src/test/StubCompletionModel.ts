import type { CompletionModel } from "../OpenAI/openaiClient";

export type CompletionCall = {
  prompt: string;
  temperature: number;
};

/**
 * Completion model that answers with a fixed reply (or rejects with a fixed
 * error) and records every call.
 */
export class StubCompletionModel implements CompletionModel {
  readonly calls: CompletionCall[] = [];

  constructor(private readonly reply: string | Error) {}

  async complete(prompt: string, temperature: number): Promise<string> {
    this.calls.push({ prompt, temperature });
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return this.reply;
  }
}
