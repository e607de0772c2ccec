import crossFetch from 'cross-fetch';
import { z } from 'zod';

export type LLMRole = 'system' | 'user' | 'assistant';

export interface LLMMessage {
  role: LLMRole;
  content: string;
}

export interface OpenAIConnection {
  apiKey?: string;
  baseUrl: string;
}

export interface LLMChatOptions {
  model: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LLMChatResult {
  content: string;
  latencyMs: number;
}

export class OpenAIError extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'OpenAIError';
  }
}

const chatResponseSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable().optional() }) })).min(1),
});

const embeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
});

function deriveTemperature(model: string, requested?: number): number {
  const modelLc = model.toLowerCase();
  // Reasoning models only accept temperature=1.
  if (modelLc.startsWith('o1') || modelLc.startsWith('o3') || modelLc.startsWith('gpt-5')) return 1;
  return requested ?? 0;
}

async function postJson(conn: OpenAIConnection, path: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
  if (!conn.apiKey) {
    throw new OpenAIError('OPENAI_API_KEY is not set');
  }
  const res = await crossFetch(`${conn.baseUrl}${path}`, {
    method: 'POST',
    headers: {
      'Authorization': `Bearer ${conn.apiKey}`,
      'Content-Type': 'application/json',
    },
    body: JSON.stringify(body),
    signal,
  });

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new OpenAIError(`OpenAI error: ${res.status} ${res.statusText} ${text.slice(0, 200)}`.trim(), res.status);
  }
  return res.json();
}

export async function openaiChat(conn: OpenAIConnection, messages: LLMMessage[], opts: LLMChatOptions): Promise<LLMChatResult> {
  const started = Date.now();
  const json = await postJson(conn, '/chat/completions', {
    model: opts.model,
    messages: messages.map(m => ({ role: m.role, content: m.content })),
    temperature: deriveTemperature(opts.model, opts.temperature),
    max_tokens: opts.maxTokens,
  }, opts.signal);

  const parsed = chatResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new OpenAIError('OpenAI chat error: malformed response');
  }
  return {
    content: String(parsed.data.choices[0].message.content ?? '').trim(),
    latencyMs: Date.now() - started,
  };
}

export async function openaiEmbed(conn: OpenAIConnection, input: string, opts: { model: string; signal?: AbortSignal }): Promise<number[]> {
  const json = await postJson(conn, '/embeddings', { model: opts.model, input }, opts.signal);
  const parsed = embeddingResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new OpenAIError('OpenAI embeddings error: malformed response');
  }
  return parsed.data.data[0].embedding;
}
