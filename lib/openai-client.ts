import OpenAI from 'openai';
import { loadTutorSettings } from '@/config/tutor';

type Effort = 'low' | 'medium' | 'high';

function resolveEffort(): Effort {
  const eff = (process.env.OPENAI_REASONING_EFFORT || 'medium').trim().toLowerCase();
  return eff === 'low' || eff === 'medium' || eff === 'high' ? eff : 'medium';
}

function reasoningBlockFor(model: string): Pick<OpenAI.Responses.ResponseCreateParamsNonStreaming, 'reasoning'> {
  // Reasoning models take an effort setting instead of temperature tuning
  if (/^(gpt-5|o\d)/i.test(model)) {
    return { reasoning: { effort: resolveEffort() } };
  }
  return {};
}

let client: OpenAI | null = null;

function getClient(): OpenAI {
  if (!process.env.OPENAI_API_KEY) {
    throw new Error('OPENAI_API_KEY missing');
  }
  if (!client) {
    client = new OpenAI({ apiKey: process.env.OPENAI_API_KEY });
  }
  return client;
}

export class OpenAIRequestError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'OpenAIRequestError';
    this.status = status;
  }
}

export type TextCallParams = {
  system: string;
  user: string;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  agent?: string;
};

function describeError(err: unknown): { status?: number; message: string } {
  if (err instanceof OpenAI.APIError) {
    return { status: err.status, message: err.message };
  }
  return { message: err instanceof Error ? err.message : String(err) };
}

export async function callText({
  system,
  user,
  model = loadTutorSettings().model,
  temperature = 0,
  maxOutputTokens,
  agent
}: TextCallParams): Promise<string> {
  const openai = getClient();

  const buildPayload = (includeTemperature: boolean): OpenAI.Responses.ResponseCreateParamsNonStreaming => ({
    model,
    input: [
      { role: 'system', content: system },
      { role: 'user', content: user }
    ],
    text: { format: { type: 'text' } },
    ...reasoningBlockFor(model),
    ...(includeTemperature ? { temperature } : {}),
    ...(typeof maxOutputTokens === 'number' ? { max_output_tokens: maxOutputTokens } : {})
  });

  console.info(`[LLM][agent=${agent || 'unknown'}] callText model=${model}`);
  let res: OpenAI.Responses.Response;
  try {
    res = await openai.responses.create(buildPayload(true));
  } catch (err) {
    const first = describeError(err);
    if (!/Unsupported parameter: 'temperature'/.test(first.message)) {
      throw new OpenAIRequestError(`OpenAI error ${first.status ?? ''}: ${first.message}`, first.status);
    }
    try {
      res = await openai.responses.create(buildPayload(false));
    } catch (err2) {
      const second = describeError(err2);
      throw new OpenAIRequestError(`OpenAI error ${second.status ?? ''}: ${second.message}`, second.status);
    }
  }

  if (res.usage) {
    console.info(
      `[LLM][agent=${agent || 'unknown'}] done tokens in=${res.usage.input_tokens} out=${res.usage.output_tokens} model=${model}`
    );
  }

  const text = res.output_text;
  if (!text) {
    throw new OpenAIRequestError('OpenAI returned empty response');
  }
  return text.trim();
}
