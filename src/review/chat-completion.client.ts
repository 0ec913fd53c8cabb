import { Inject, Injectable, ConsoleLogger } from '@nestjs/common';
import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { ConfigService } from '../config/config.service.js';
import { USER_AGENT } from '../constants.js';
import {
  describeTransportError,
  isTimeout,
  sanitizeErrorMessage,
} from './error-utils.js';
import type {
  AttemptFailure,
  AttemptResult,
  Endpoint,
  ReviewUnit,
} from './review.types.js';

/** Injection token for the axios instance used for chat-completion calls. */
export const HTTP_CLIENT = Symbol('HTTP_CLIENT');

export const SYSTEM_PROMPT = `You are a very experienced senior developer. Analyze the following code and provide recommendations on:
- Security vulnerabilities and best practices
- Performance optimizations and efficiency improvements
- Code correctness and potential bugs
- Code readability and maintainability
- Clean architecture principles
- Idiomatic practices for the language the code is written in

Provide only actionable, specific, and important recommendations. Be concise and focus on real issues.`;

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature: number;
  stream: false;
}

export interface AttemptOptions {
  signal?: AbortSignal;
}

type Decoded =
  | { ok: true; body: Record<string, unknown> }
  | { ok: false; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(failure: AttemptFailure): AttemptResult {
  return { ok: false, failure };
}

@Injectable()
export class ChatCompletionClient {
  constructor(
    @Inject(ConsoleLogger) private readonly logger: ConsoleLogger,
    @Inject(ConfigService) private readonly configService: ConfigService,
    @Inject(HTTP_CLIENT) private readonly http: AxiosInstance,
  ) {
    this.logger.setContext(ChatCompletionClient.name);
  }

  buildRequest(unit: ReviewUnit): ChatCompletionRequest {
    const { api } = this.configService.getConfig();
    return {
      model: api.model,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: unit.content },
      ],
      max_tokens: api.maxTokens,
      temperature: api.temperature,
      stream: false,
    };
  }

  /** Exactly one request against `endpoint`. Never throws, never retries. */
  async attempt(
    endpoint: Endpoint,
    unit: ReviewUnit,
    options: AttemptOptions = {},
  ): Promise<AttemptResult> {
    const { api } = this.configService.getConfig();
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'User-Agent': USER_AGENT,
    };
    if (api.apiKey) {
      headers.Authorization = `Bearer ${api.apiKey}`;
    }

    this.logger.debug(`[SEND] ${unit.path} -> ${endpoint}`);
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(endpoint, this.buildRequest(unit), {
        headers,
        timeout: api.timeoutMs,
        signal: options.signal,
        responseType: 'text',
        // Raw body: decoding is classified separately from transport errors.
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });
    } catch (error) {
      return fail(this.classifyTransportError(error, api.timeoutMs));
    }

    if (response.status < 200 || response.status >= 300) {
      return fail({
        kind: 'status',
        reason: this.describeStatus(response.status, response.statusText, api.model),
        retryable: true,
        status: response.status,
      });
    }

    const decoded = this.decode(response.data);
    if (!decoded.ok) {
      return fail({ kind: 'decode', reason: decoded.reason, retryable: false });
    }
    const { body } = decoded;

    if (body.error !== undefined && body.error !== null) {
      return fail({
        kind: 'application',
        reason: `API error: ${this.applicationErrorMessage(body.error)}`,
        retryable: false,
      });
    }

    const choices = body.choices;
    if (choices === undefined || choices === null) {
      return fail({
        kind: 'empty-result',
        reason: 'no review choices returned',
        retryable: false,
      });
    }
    if (!Array.isArray(choices)) {
      return fail({
        kind: 'decode',
        reason: 'failed to decode response: "choices" is not an array',
        retryable: false,
      });
    }
    if (choices.length === 0) {
      return fail({
        kind: 'empty-result',
        reason: 'no review choices returned',
        retryable: false,
      });
    }
    const first: unknown = choices[0];
    const message = isRecord(first) ? first.message : undefined;
    const content = isRecord(message) ? message.content : undefined;
    if (typeof content !== 'string') {
      return fail({
        kind: 'decode',
        reason: 'failed to decode response: first choice has no message content',
        retryable: false,
      });
    }
    return { ok: true, text: content };
  }

  private classifyTransportError(error: unknown, timeoutMs: number): AttemptFailure {
    if (axios.isCancel(error)) {
      return { kind: 'transport', reason: 'request canceled', retryable: true };
    }
    if (isTimeout(error)) {
      return {
        kind: 'transport',
        reason: `request timed out after ${timeoutMs}ms`,
        retryable: true,
      };
    }
    return {
      kind: 'transport',
      reason: `failed to make request: ${describeTransportError(error)}`,
      retryable: true,
    };
  }

  private describeStatus(status: number, statusText: string, model: string): string {
    switch (status) {
      case 400:
        return `bad request (400): malformed request or unsupported model '${model}'`;
      case 401:
        return 'authentication failed (401): check your API key';
      case 403:
        return 'access forbidden (403): insufficient permissions or invalid API key';
      case 404:
        return `model not found (404): check if model '${model}' exists and the endpoint URL is correct`;
      case 429:
        return 'rate limit exceeded (429): too many requests, please wait and try again';
    }
    if (status >= 500 && status < 600) {
      return `server error (${status}): API service temporarily unavailable`;
    }
    return statusText
      ? `API returned status ${status}: ${statusText}`
      : `API returned status ${status}`;
  }

  private decode(data: unknown): Decoded {
    let parsed: unknown = data;
    if (typeof data === 'string') {
      try {
        parsed = JSON.parse(data);
      } catch (error) {
        return {
          ok: false,
          reason: `failed to decode response: ${sanitizeErrorMessage(error)}`,
        };
      }
    }
    if (!isRecord(parsed)) {
      return {
        ok: false,
        reason: 'failed to decode response: body is not a JSON object',
      };
    }
    return { ok: true, body: parsed };
  }

  private applicationErrorMessage(error: unknown): string {
    if (isRecord(error) && typeof error.message === 'string') {
      return sanitizeErrorMessage(error.message);
    }
    if (typeof error === 'string') return sanitizeErrorMessage(error);
    return 'unknown error';
  }
}
