import { Injectable, Logger } from '@nestjs/common';
import { AI_PROVIDER } from '../config/credibility.constants';
import { cleanText } from '../utils/text.util';

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);
const FENCE_RE = /```(?:json)?/gi;

export interface WordRequest {
  systemPrompt: string;
  userPrompt: string;
  /** JSON field of the reply that holds the one-word answer. */
  field: string;
}

export interface AskOptions {
  signal?: AbortSignal;
}

interface ProviderCall {
  name: string;
  url: string;
  headers: Record<string, string>;
  body: string;
  retries: number;
  backoffMs: number;
  timeoutMs: number;
  readText: (json: Record<string, unknown> | null) => string;
}

interface FetchResult {
  ok: boolean;
  status: number;
  raw: string;
  json: Record<string, unknown> | null;
}

/**
 * Asks the configured model for a one-word JSON answer. Every attempt and
 * every retry wait is bound to the caller's signal; an aborted call returns
 * null and sends nothing further.
 */
@Injectable()
export class LlmClientService {
  private readonly logger = new Logger(LlmClientService.name);
  private readonly unavailableLogged = new Set<string>();

  async askWord(
    request: WordRequest,
    options: AskOptions = {},
  ): Promise<string | null> {
    const call =
      AI_PROVIDER === 'openai'
        ? this.openaiCall(request)
        : this.geminiCall(request);
    if (!call) {
      return null;
    }

    const { signal } = options;
    for (let attempt = 1; attempt <= call.retries + 1; attempt += 1) {
      if (signal?.aborted) {
        return null;
      }
      const response = await this.fetchJson(call, signal);
      if (signal?.aborted) {
        return null;
      }

      const retryable = attempt <= call.retries;
      if (!response.ok) {
        if (RETRYABLE_STATUS.has(response.status) && retryable) {
          await this.sleep(call.backoffMs * 2 ** (attempt - 1), signal);
          continue;
        }
        this.logUnavailable(
          `${call.name}_request_failed`,
          `${response.status} ${response.raw.slice(0, 180)}`,
        );
        return null;
      }

      const word = this.readWord(call.readText(response.json), request.field);
      if (word) {
        return word;
      }
      if (retryable) {
        await this.sleep(call.backoffMs * 2 ** (attempt - 1), signal);
        continue;
      }
      this.logUnavailable(`${call.name} reply has no ${request.field}`);
    }
    return null;
  }

  private geminiCall(request: WordRequest): ProviderCall | null {
    const apiKey = (process.env.GEMINI_API_KEY ?? '').trim();
    if (!apiKey) {
      this.logUnavailable('GEMINI_API_KEY not set');
      return null;
    }

    const base =
      process.env.GEMINI_API_BASE ??
      'https://generativelanguage.googleapis.com/v1beta';
    const model = process.env.GEMINI_MODEL ?? 'gemini-2.0-flash';
    return {
      name: 'gemini',
      url: `${base}/models/${model}:generateContent`,
      headers: {
        'x-goog-api-key': apiKey,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        contents: [{ role: 'user', parts: [{ text: request.userPrompt }] }],
        systemInstruction: { parts: [{ text: request.systemPrompt }] },
        generationConfig: {
          temperature: 0,
          maxOutputTokens: Number(process.env.GEMINI_MAX_OUTPUT_TOKENS ?? 200),
          responseMimeType: 'application/json',
        },
      }),
      retries: Number(process.env.GEMINI_MAX_RETRIES ?? 2),
      backoffMs: Number(process.env.GEMINI_RETRY_BACKOFF_SEC ?? 1.5) * 1000,
      timeoutMs: Number(process.env.GEMINI_TIMEOUT_SEC ?? 60) * 1000,
      readText: (json) => {
        const candidate = this.firstRecord(json?.candidates);
        const content = this.asRecord(candidate?.content);
        const part = this.firstRecord(content?.parts);
        return typeof part?.text === 'string' ? part.text : '';
      },
    };
  }

  private openaiCall(request: WordRequest): ProviderCall | null {
    const apiKey = (process.env.OPENAI_API_KEY ?? '').trim();
    if (!apiKey) {
      this.logUnavailable('OPENAI_API_KEY not set');
      return null;
    }

    const base = process.env.OPENAI_API_BASE ?? 'https://api.openai.com/v1';
    return {
      name: 'openai',
      url: `${base}/chat/completions`,
      headers: {
        Authorization: `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: process.env.OPENAI_MODEL ?? 'gpt-4o-mini',
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.userPrompt },
        ],
        temperature: 0,
      }),
      retries: Number(process.env.OPENAI_MAX_RETRIES ?? 2),
      backoffMs: 1200,
      timeoutMs: Number(process.env.OPENAI_TIMEOUT_SEC ?? 60) * 1000,
      readText: (json) => {
        const choice = this.firstRecord(json?.choices);
        const message = this.asRecord(choice?.message);
        return typeof message?.content === 'string' ? message.content : '';
      },
    };
  }

  private readWord(text: string, field: string): string | null {
    const body = text.replace(FENCE_RE, '').trim();
    if (!body) {
      return null;
    }
    try {
      const value = this.asRecord(JSON.parse(body))?.[field];
      return typeof value === 'string' && value.trim()
        ? value.trim().toLowerCase()
        : null;
    } catch {
      return null;
    }
  }

  private async fetchJson(
    call: ProviderCall,
    signal?: AbortSignal,
  ): Promise<FetchResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), call.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const res = await fetch(call.url, {
        method: 'POST',
        headers: call.headers,
        body: call.body,
        signal: controller.signal,
      });
      const raw = await res.text();
      let json: Record<string, unknown> | null = null;
      try {
        json = this.asRecord(JSON.parse(raw));
      } catch {
        json = null;
      }
      return { ok: res.ok, status: res.status, raw, json };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, status: 0, raw: message, json: null };
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private firstRecord(value: unknown): Record<string, unknown> | null {
    return Array.isArray(value) ? this.asRecord(value[0]) : null;
  }

  private asRecord(value: unknown): Record<string, unknown> | null {
    if (!value || typeof value !== 'object' || Array.isArray(value)) {
      return null;
    }
    return value as Record<string, unknown>;
  }

  private logUnavailable(reason: string, detail?: string): void {
    if (this.unavailableLogged.has(reason)) {
      return;
    }
    this.unavailableLogged.add(reason);
    const detailText = cleanText(detail || '');
    if (detailText) {
      this.logger.warn(`AI unavailable: ${reason} (${detailText})`);
      return;
    }
    this.logger.warn(`AI unavailable: ${reason}`);
  }

  /** Resolves early when the signal aborts. */
  private async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return;
    }
    await new Promise<void>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      signal?.addEventListener('abort', done, { once: true });
    });
  }
}
