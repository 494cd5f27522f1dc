// Unified LLM client: message types, provider adapters and middleware

export type Role = "system" | "user" | "assistant";

export interface ContentPart {
  kind: "text";
  text: string;
}

export interface Message {
  role: Role;
  content: ContentPart[];
}

// Convenience constructors
export const Message = {
  system: (text: string): Message => ({
    role: "system",
    content: [{ kind: "text", text }],
  }),
  user: (text: string): Message => ({
    role: "user",
    content: [{ kind: "text", text }],
  }),
  assistant: (text: string): Message => ({
    role: "assistant",
    content: [{ kind: "text", text }],
  }),
  getText: (msg: Message): string => msg.content.map((p) => p.text).join(""),
};

export interface ResponseFormat {
  type: "text" | "json";
}

export interface Request {
  model: string;
  messages: Message[];
  provider?: string;
  responseFormat?: ResponseFormat;
  temperature?: number;
  maxTokens?: number;
}

export interface FinishReason {
  reason: "stop" | "length" | "content_filter" | "error" | "other";
  raw?: string;
}

export interface Usage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface Response {
  id: string;
  model: string;
  provider: string;
  message: Message;
  finishReason: FinishReason;
  usage: Usage;
}

export interface ProviderAdapter {
  readonly name: string;
  complete(request: Request): Promise<Response>;
}

export type Middleware = (req: Request, next: (r: Request) => Promise<Response>) => Promise<Response>;

// HTTP error types
export class SDKError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly provider?: string,
    public readonly retryable: boolean = false,
  ) {
    super(message);
    this.name = "SDKError";
  }
}

export function isRetryableError(err: unknown): boolean {
  if (err instanceof SDKError) return err.retryable;
  return false;
}

// ─── Retry ────────────────────────────────────────────────────────────────────

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 200,
  backoffFactor: 2.0,
  maxDelayMs: 10_000,
};

export function delayForAttempt(attempt: number, policy: RetryPolicy): number {
  const delay = policy.initialDelayMs * Math.pow(policy.backoffFactor, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/** Retries rate-limit and server errors with exponential backoff. */
export function retryMiddleware(policy: RetryPolicy = DEFAULT_RETRY_POLICY): Middleware {
  return async (req, next) => {
    for (let attempt = 1; ; attempt++) {
      try {
        return await next(req);
      } catch (err) {
        if (attempt >= policy.maxAttempts || !isRetryableError(err)) throw err;
        const delay = delayForAttempt(attempt, policy);
        console.warn(`[llm] Attempt ${attempt} failed, retrying in ${delay}ms`);
        await new Promise((r) => setTimeout(r, delay));
      }
    }
  };
}

// Main Client
export class Client {
  private adapters = new Map<string, ProviderAdapter>();
  private defaultProvider?: string;
  private middleware: Middleware[] = [];

  register(adapter: ProviderAdapter, isDefault = false): void {
    this.adapters.set(adapter.name, adapter);
    if (isDefault || !this.defaultProvider) {
      this.defaultProvider = adapter.name;
    }
  }

  use(mw: Middleware): void {
    this.middleware.push(mw);
  }

  private resolveProvider(req: Request): ProviderAdapter {
    const providerName = req.provider ?? this.defaultProvider;
    const adapter = providerName ? this.adapters.get(providerName) : undefined;
    if (!adapter) {
      throw new SDKError(`No adapter registered for provider: ${providerName ?? "(none)"}`);
    }
    return adapter;
  }

  async complete(request: Request): Promise<Response> {
    type Handler = (req: Request) => Promise<Response>;
    const execute: Handler = async (req: Request): Promise<Response> => {
      return this.resolveProvider(req).complete(req);
    };

    // Apply middleware chain (right to left)
    const chain = this.middleware.reduceRight<Handler>(
      (next, mw) => (req: Request) => mw(req, next),
      execute,
    );
    return chain(request);
  }
}
