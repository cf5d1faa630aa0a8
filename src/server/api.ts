/**
 * HTTP surface of llama-server: /health, /props and the OpenAI-compatible
 * chat completion endpoint. Responses are validated with zod.
 */

import { basename } from 'node:path';
import { z } from 'zod';
import { TransientNetworkError } from '../errors.js';
import { fetchWithTimeout } from '../utils/http.js';
import type { ChatMessage, GenerateOptions, GenerationResult } from './types.js';

export const PropsResponseSchema = z
  .object({
    model_alias: z.string().optional(),
    model_path: z.string().optional(),
    build_info: z.string().optional(),
  })
  .passthrough();

export type PropsResponse = z.infer<typeof PropsResponseSchema>;

export const ChatCompletionResponseSchema = z
  .object({
    choices: z
      .array(
        z
          .object({
            message: z.object({ content: z.string().nullable() }).passthrough().optional(),
            text: z.string().optional(),
          })
          .passthrough()
      )
      .optional(),
    // Legacy /completion style payload
    text: z.string().optional(),
  })
  .passthrough();

const StreamChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.string().nullable().optional() }).passthrough().optional(),
        text: z.string().optional(),
      }).passthrough()
    )
    .optional(),
});

export interface ServerProps {
  model?: string;
  build?: string;
}

export function extractContent(data: unknown): string {
  const parsed = ChatCompletionResponseSchema.safeParse(data);
  if (!parsed.success) {
    return '';
  }

  const choice = parsed.data.choices?.[0];
  if (choice?.message?.content != null) {
    return choice.message.content;
  }
  if (choice?.text !== undefined) {
    return choice.text;
  }
  return parsed.data.text ?? '';
}

/**
 * Concatenate the content deltas of an SSE chat completion stream.
 */
export function collectStreamContent(body: string): string {
  let content = '';
  for (const line of body.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed.startsWith('data:')) continue;

    const payload = trimmed.slice('data:'.length).trim();
    if (payload === '[DONE]') break;

    let json: unknown;
    try {
      json = JSON.parse(payload);
    } catch {
      continue;
    }

    const chunk = StreamChunkSchema.safeParse(json);
    if (!chunk.success) continue;
    const choice = chunk.data.choices?.[0];
    content += choice?.delta?.content ?? choice?.text ?? '';
  }
  return content;
}

export class LlamaServerApi {
  readonly baseUrl: string;

  constructor(host: string, port: number) {
    this.baseUrl = `http://${host}:${port}`;
  }

  /**
   * HTTP status of /health. Throws TransientNetworkError when unreachable.
   */
  async health(timeoutMs: number): Promise<number> {
    return fetchWithTimeout(`${this.baseUrl}/health`, { timeoutMs }, async (response) => {
      // Drain the body so the connection can be reused
      await response.text();
      return response.status;
    });
  }

  async props(timeoutMs: number): Promise<ServerProps> {
    const url = `${this.baseUrl}/props`;
    const body = await fetchWithTimeout(url, { timeoutMs }, async (response) => {
      if (!response.ok) {
        throw new TransientNetworkError(`GET /props returned HTTP ${response.status}`, url, response.status);
      }
      const json: unknown = await response.json();
      return json;
    });

    const parsed = PropsResponseSchema.safeParse(body);
    if (!parsed.success) {
      return {};
    }

    const { model_alias, model_path, build_info } = parsed.data;
    return {
      model: model_alias ?? (model_path ? basename(model_path) : undefined),
      build: build_info,
    };
  }

  async chatCompletion(
    messages: ChatMessage[],
    options: Required<GenerateOptions>,
    timeoutMs: number
  ): Promise<GenerationResult> {
    const url = `${this.baseUrl}/v1/chat/completions`;
    return fetchWithTimeout(
      url,
      {
        timeoutMs,
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          messages,
          temperature: options.temperature,
          max_tokens: options.maxTokens,
          stream: options.stream,
        }),
      },
      async (response) => {
        if (!response.ok) {
          const text = await response.text();
          throw new TransientNetworkError(
            `Chat completion failed: HTTP ${response.status}${text ? ` ${text.slice(0, 200)}` : ''}`,
            url,
            response.status
          );
        }

        if (options.stream) {
          return { content: collectStreamContent(await response.text()) };
        }
        const json: unknown = await response.json();
        return { content: extractContent(json) };
      }
    );
  }
}
