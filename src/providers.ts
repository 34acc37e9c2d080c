/**
 * Chat-completion clients for the judge
 *
 * Supports:
 * - OpenAI chat completions
 * - Azure OpenAI deployments
 * - Anthropic messages
 */

import { getModel, getProviderApiKey, getApiKeyEnvVar, type AIProvider, type EvalConfig } from './config.js';
import { logger } from './logger.js';

export interface ChatOptions {
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  timeout?: number;       // Request timeout in ms
  maxRetries?: number;
  /** Base delay for exponential backoff, doubled per attempt */
  backoffMs?: number;
}

export interface ChatResponse {
  content: string;
  provider: AIProvider;
  model: string;
  inputTokens?: number;
  outputTokens?: number;
}

export type ChatFn = (prompt: string, options?: ChatOptions) => Promise<ChatResponse>;

const PROVIDER_URLS = {
  openai: 'https://api.openai.com/v1/chat/completions',
  anthropic: 'https://api.anthropic.com/v1/messages',
  azureApiVersion: '2024-10-21',
} as const;

const DEFAULTS = {
  maxTokens: 2000,
  temperature: 0.1,
  timeout: 60000,
  maxRetries: 3,
  backoffMs: 2000,
} as const;

/**
 * Sleep helper for retry backoff
 */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class ProviderError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'ProviderError';
  }
}

function isRetryable(error: Error): boolean {
  if (error instanceof ProviderError && (error.status === 429 || error.status === 529)) {
    return true;
  }
  return /rate limit|overloaded|\b429\b|\b529\b/i.test(error.message);
}

/**
 * Build a chat function bound to one provider configuration.
 * Includes retry logic for rate limiting (429) and overload (529).
 */
export function createChat(config: EvalConfig): ChatFn {
  return async (prompt, options = {}) => {
    const apiKey = getProviderApiKey(config);
    if (!apiKey) {
      throw new Error(`No API key configured for ${config.provider}. Set ${getApiKeyEnvVar(config.provider)}.`);
    }

    const timeout = options.timeout ?? DEFAULTS.timeout;
    const maxRetries = options.maxRetries ?? DEFAULTS.maxRetries;
    const backoffMs = options.backoffMs ?? DEFAULTS.backoffMs;
    let lastError: Error | null = null;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      try {
        switch (config.provider) {
          case 'openai':
            return await chatOpenAI(config, apiKey, prompt, options, controller.signal);
          case 'azure':
            return await chatAzure(config, apiKey, prompt, options, controller.signal);
          case 'anthropic':
            return await chatAnthropic(config, apiKey, prompt, options, controller.signal);
        }
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (isRetryable(lastError) && attempt < maxRetries - 1) {
          const delay = backoffMs * Math.pow(2, attempt);
          logger.info(`Rate limited, retrying in ${delay / 1000}s (attempt ${attempt + 1}/${maxRetries})`);
          await sleep(delay);
          continue;
        }

        throw lastError;
      } finally {
        clearTimeout(timeoutId);
      }
    }

    throw lastError || new Error('Chat failed after retries');
  };
}

// ============================================================================
// OPENAI-COMPATIBLE
// ============================================================================

interface CompletionPayload {
  choices?: Array<{ message?: { content?: string | null } }>;
  usage?: { prompt_tokens?: number; completion_tokens?: number };
}

function buildMessages(prompt: string, options: ChatOptions): Array<{ role: string; content: string }> {
  const messages: Array<{ role: string; content: string }> = [];
  if (options.systemPrompt) {
    messages.push({ role: 'system', content: options.systemPrompt });
  }
  messages.push({ role: 'user', content: prompt });
  return messages;
}

async function readCompletion(
  response: Response,
  provider: AIProvider,
  model: string
): Promise<ChatResponse> {
  if (!response.ok) {
    const error = await response.text();
    throw new ProviderError(`${provider} API error (${response.status}): ${error.slice(0, 200)}`, response.status);
  }

  const data = await response.json() as CompletionPayload;
  return {
    content: data.choices?.[0]?.message?.content?.trim() ?? '',
    provider,
    model,
    inputTokens: data.usage?.prompt_tokens,
    outputTokens: data.usage?.completion_tokens,
  };
}

async function chatOpenAI(
  config: EvalConfig,
  apiKey: string,
  prompt: string,
  options: ChatOptions,
  signal: AbortSignal
): Promise<ChatResponse> {
  const model = getModel(config);
  const response = await fetch(PROVIDER_URLS.openai, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${apiKey}`,
    },
    body: JSON.stringify({
      model,
      messages: buildMessages(prompt, options),
      max_tokens: options.maxTokens ?? DEFAULTS.maxTokens,
      temperature: options.temperature ?? DEFAULTS.temperature,
    }),
    signal,
  });
  return readCompletion(response, 'openai', model);
}

/**
 * Azure OpenAI
 * - Deployment-scoped URL, api-key header
 */
async function chatAzure(
  config: EvalConfig,
  apiKey: string,
  prompt: string,
  options: ChatOptions,
  signal: AbortSignal
): Promise<ChatResponse> {
  if (!config.azureEndpoint) {
    throw new Error('Azure provider needs AZURE_OPENAI_ENDPOINT');
  }
  const deployment = config.azureDeployment || getModel(config);
  const apiVersion = config.azureApiVersion || PROVIDER_URLS.azureApiVersion;
  const url = new URL(
    `/openai/deployments/${encodeURIComponent(deployment)}/chat/completions`,
    config.azureEndpoint
  );
  url.searchParams.set('api-version', apiVersion);

  const response = await fetch(url, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      'api-key': apiKey,
    },
    body: JSON.stringify({
      messages: buildMessages(prompt, options),
      max_tokens: options.maxTokens ?? DEFAULTS.maxTokens,
      temperature: options.temperature ?? DEFAULTS.temperature,
    }),
    signal,
  });
  return readCompletion(response, 'azure', deployment);
}

// ============================================================================
// ANTHROPIC
// ============================================================================

async function chatAnthropic(
  config: EvalConfig,
  apiKey: string,
  prompt: string,
  options: ChatOptions,
  signal: AbortSignal
): Promise<ChatResponse> {
  const model = getModel(config);
  const body: Record<string, unknown> = {
    model,
    max_tokens: options.maxTokens ?? DEFAULTS.maxTokens,
    temperature: options.temperature ?? DEFAULTS.temperature,
    messages: [{ role: 'user', content: prompt }],
  };
  if (options.systemPrompt) {
    body.system = options.systemPrompt;
  }

  const response = await fetch(PROVIDER_URLS.anthropic, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      'x-api-key': apiKey,
      'anthropic-version': '2023-06-01',
    },
    body: JSON.stringify(body),
    signal,
  });

  if (!response.ok) {
    const error = await response.text();
    if (response.status === 529) {
      throw new ProviderError('Anthropic API overloaded. Try again in a few seconds.', 529);
    }
    throw new ProviderError(`anthropic API error (${response.status}): ${error.slice(0, 200)}`, response.status);
  }

  const data = await response.json() as {
    content?: Array<{ type: string; text?: string }>;
    usage?: { input_tokens?: number; output_tokens?: number };
  };

  const text = data.content?.find(block => block.type === 'text')?.text ?? '';
  return {
    content: text.trim(),
    provider: 'anthropic',
    model,
    inputTokens: data.usage?.input_tokens,
    outputTokens: data.usage?.output_tokens,
  };
}
