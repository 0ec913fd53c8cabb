export interface ApiConfig {
  /** Single endpoint used when `endpoints` is empty. */
  url: string;
  /** Equivalent chat-completion endpoints, tried round-robin with failover. */
  endpoints: string[];
  apiKey?: string;
  model: string;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
}

export interface ReviewSettings {
  concurrency: number;
  maxFileSize: number;
  extensions?: string[];
  includeTests: boolean;
  sensitivePatterns?: string[];
}

export interface AiReviewConfig {
  api: ApiConfig;
  review: ReviewSettings;
}

/** Values supplied on the command line; they win over file and env config. */
export interface ConfigOverrides {
  url?: string;
  endpoints?: string[];
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  maxFileSize?: number;
  concurrency?: number;
  includeTests?: boolean;
}
