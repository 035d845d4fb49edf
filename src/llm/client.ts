// src/llm/client.ts — Anthropic Messages transport for confidence refinement

import type { ResolvedConfig } from "../types.js";
import { LLMError } from "../types.js";

export interface MessageRequest {
  system: string;
  prompt: string;
  /** Upper bound for the reply; capped by the configured maxOutputTokens. */
  maxTokens?: number;
}

interface MessagesResponse {
  content?: { type?: string; text?: string }[];
}

const API_VERSION = "2023-06-01";
const DEFAULT_BASE_URL = "https://api.anthropic.com";
const REQUEST_TIMEOUT_MS = 120_000;
const DEFAULT_RETRY_DELAY_MS = 2000;
const MAX_ERROR_BODY = 200;

/**
 * Send one request, retrying once after `retryDelayMs` when the failure is
 * transient (network error, timeout, 429 or 5xx). Client errors such as a
 * rejected key are thrown as is.
 */
export async function callLLMWithRetry(
  request: MessageRequest,
  llmConfig: ResolvedConfig["llm"],
  retryDelayMs: number = DEFAULT_RETRY_DELAY_MS,
): Promise<string> {
  const apiKey = llmConfig.apiKey;
  if (!apiKey) {
    throw new LLMError("No API key provided. Set ANTHROPIC_API_KEY to enable --refine.");
  }

  try {
    return await sendMessage(request, llmConfig, apiKey);
  } catch (err) {
    if (!isRetryable(err)) throw err;
    await new Promise((resolve) => setTimeout(resolve, retryDelayMs));
    try {
      return await sendMessage(request, llmConfig, apiKey);
    } catch (retryErr) {
      throw new LLMError(
        `LLM API failed after retry: ${retryErr instanceof Error ? retryErr.message : String(retryErr)}`,
        retryErr instanceof LLMError ? retryErr.statusCode : undefined,
      );
    }
  }
}

function isRetryable(err: unknown): boolean {
  if (!(err instanceof LLMError) || err.statusCode === undefined) return true;
  return err.statusCode === 429 || err.statusCode >= 500;
}

async function sendMessage(
  request: MessageRequest,
  llmConfig: ResolvedConfig["llm"],
  apiKey: string,
): Promise<string> {
  const url = `${llmConfig.baseUrl ?? DEFAULT_BASE_URL}/v1/messages`;
  const maxTokens = Math.min(request.maxTokens ?? llmConfig.maxOutputTokens, llmConfig.maxOutputTokens);

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

  try {
    const response = await fetch(url, {
      method: "POST",
      signal: controller.signal,
      headers: {
        "Content-Type": "application/json",
        "x-api-key": apiKey,
        "anthropic-version": API_VERSION,
      },
      body: JSON.stringify({
        model: llmConfig.model,
        max_tokens: maxTokens,
        system: request.system,
        messages: [{ role: "user", content: request.prompt }],
        temperature: 0,
      }),
    });

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new LLMError(`LLM API returned ${response.status}: ${body.slice(0, MAX_ERROR_BODY)}`, response.status);
    }

    const data: MessagesResponse = await response.json();
    const text = data.content?.find((block) => block.type === "text" && block.text)?.text;
    if (!text) throw new LLMError("LLM response has no text block");
    return text;
  } catch (err) {
    if (err instanceof Error && err.name === "AbortError") {
      throw new LLMError(`LLM API request timed out after ${REQUEST_TIMEOUT_MS / 1000}s`);
    }
    throw err;
  } finally {
    clearTimeout(timer);
  }
}
