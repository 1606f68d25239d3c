import { callText } from '@/lib/openai-client';

export type GenerateRequest = {
  system: string;
  user: string;
  agent: string;
  temperature?: number;
  maxOutputTokens?: number;
};

/** Text in, text out. Implementations may be arbitrarily slow; no timeout is applied here. */
export interface TextGenerator {
  generate(request: GenerateRequest): Promise<string>;
}

export class OpenAITextGenerator implements TextGenerator {
  constructor(private readonly model?: string) {}

  generate({ system, user, agent, temperature, maxOutputTokens }: GenerateRequest): Promise<string> {
    return callText({ system, user, agent, temperature, maxOutputTokens, model: this.model });
  }
}
