import {
  EXPENSE_CATEGORIES,
  RemoteCategoryReplySchema,
  type RemoteCategoryReply,
} from "@expense-scan/receipt-contracts";
import { z } from "zod";

export type SupportedLlmProvider =
  | "openai"
  | "openrouter"
  | "gemini"
  | "lmstudio"
  | "openai-compatible";
export type LlmRequestMode = "responses" | "chat_completions";

export const SUPPORTED_PROVIDERS: readonly SupportedLlmProvider[] = [
  "openai",
  "openrouter",
  "gemini",
  "lmstudio",
  "openai-compatible",
];

export type CategoryInput = {
  merchantName: string;
  description?: string;
  amount?: number;
};

export type RemoteCategoryClient = {
  classifyCategory: (input: CategoryInput, signal?: AbortSignal) => Promise<RemoteCategoryReply>;
};

export type OpenAiCategoryClientOptions = {
  provider?: SupportedLlmProvider;
  apiKey?: string;
  model: string;
  baseUrl?: string;
  requestMode?: LlmRequestMode;
  extraHeaders?: Record<string, string>;
  timeoutMs?: number;
};

const ResponsesApiPayloadSchema = z.object({
  output_text: z.string().optional(),
  output: z
    .array(
      z.object({
        content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() })).optional(),
      }),
    )
    .optional(),
});

const ChatCompletionsPayloadSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z
              .union([z.string(), z.array(z.object({ text: z.string().optional() }))])
              .nullish(),
          })
          .optional(),
      }),
    )
    .optional(),
});

type ResponsesApiPayload = z.infer<typeof ResponsesApiPayloadSchema>;
type ChatCompletionsPayload = z.infer<typeof ChatCompletionsPayloadSchema>;

const SYSTEM_PROMPT = [
  "Classify a purchase into exactly one expense category.",
  `Allowed categories: ${EXPENSE_CATEGORIES.join(", ")}.`,
  "Return only a JSON object with category, confidence between 0 and 1, and a short reasoning.",
].join(" ");

const CATEGORY_REPLY_SCHEMA = {
  type: "object",
  additionalProperties: false,
  properties: {
    category: { type: "string", enum: [...EXPENSE_CATEGORIES] },
    confidence: { type: "number" },
    reasoning: { type: "string" },
  },
  required: ["category", "confidence", "reasoning"],
};

export class OpenAiCategoryClient implements RemoteCategoryClient {
  private readonly provider: SupportedLlmProvider;
  private readonly apiKey?: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly requestMode: LlmRequestMode;
  private readonly extraHeaders: Record<string, string>;
  private readonly timeoutMs: number;

  constructor(options: OpenAiCategoryClientOptions) {
    this.provider = options.provider ?? "openai";
    this.apiKey = options.apiKey?.trim() || undefined;
    this.model = options.model;
    this.baseUrl = resolveBaseUrl(this.provider, options.baseUrl);
    this.requestMode = options.requestMode ?? defaultRequestMode(this.provider);
    this.extraHeaders = sanitizeHeaders(options.extraHeaders);
    this.timeoutMs = options.timeoutMs ?? 2000;
  }

  async classifyCategory(input: CategoryInput, signal?: AbortSignal): Promise<RemoteCategoryReply> {
    const userText = buildUserText(input);
    const rawText =
      this.requestMode === "chat_completions"
        ? await this.callChatCompletionsApi(userText, signal)
        : await this.callResponsesApi(userText, signal);

    if (!rawText) {
      throw new Error(`category classification returned no content (${this.provider})`);
    }

    const parsed = RemoteCategoryReplySchema.safeParse(parseReplyJson(rawText));
    if (!parsed.success) {
      throw new Error(
        `category classification reply failed validation (${this.provider}): ${parsed.error.issues
          .map((issue) => issue.message)
          .join("; ")}`,
      );
    }
    return parsed.data;
  }

  private async callResponsesApi(userText: string, signal?: AbortSignal): Promise<string | null> {
    const body = await this.post(
      "/responses",
      {
        model: this.model,
        input: [
          { role: "system", content: [{ type: "input_text", text: SYSTEM_PROMPT }] },
          { role: "user", content: [{ type: "input_text", text: userText }] },
        ],
        text: {
          format: {
            type: "json_schema",
            name: "expense_category",
            strict: true,
            schema: CATEGORY_REPLY_SCHEMA,
          },
        },
      },
      "responses",
      signal,
    );
    const parsed = ResponsesApiPayloadSchema.safeParse(body);
    return parsed.success ? extractOutputText(parsed.data) : null;
  }

  private async callChatCompletionsApi(
    userText: string,
    signal?: AbortSignal,
  ): Promise<string | null> {
    const body = await this.post(
      "/chat/completions",
      {
        model: this.model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: userText },
        ],
        response_format: {
          type: "json_schema",
          json_schema: {
            name: "expense_category",
            strict: true,
            schema: CATEGORY_REPLY_SCHEMA,
          },
        },
      },
      "chat_completions",
      signal,
    );
    const parsed = ChatCompletionsPayloadSchema.safeParse(body);
    return parsed.success ? extractChatCompletionText(parsed.data) : null;
  }

  private async post(
    path: string,
    payload: Record<string, unknown>,
    mode: LlmRequestMode,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method: "POST",
        headers: this.buildHeaders(),
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (!response.ok) {
        const text = await response.text();
        throw new Error(
          `category classification failed via ${mode} (${this.provider}, ${response.status}): ${text}`,
        );
      }
      return await response.json();
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private buildHeaders(): Record<string, string> {
    return {
      "content-type": "application/json",
      ...this.extraHeaders,
      ...(this.apiKey ? { authorization: `Bearer ${this.apiKey}` } : {}),
    };
  }
}

export function defaultRequestMode(provider: SupportedLlmProvider): LlmRequestMode {
  switch (provider) {
    case "openrouter":
    case "gemini":
    case "lmstudio":
    case "openai-compatible":
      return "chat_completions";
    case "openai":
    default:
      return "responses";
  }
}

function resolveBaseUrl(provider: SupportedLlmProvider, override?: string): string {
  const normalizedOverride = override?.trim();
  if (normalizedOverride) {
    return normalizedOverride.replace(/\/$/, "");
  }

  switch (provider) {
    case "openrouter":
      return "https://openrouter.ai/api/v1";
    case "gemini":
      return "https://generativelanguage.googleapis.com/v1beta/openai";
    case "lmstudio":
    case "openai-compatible":
      return "http://127.0.0.1:1234/v1";
    case "openai":
    default:
      return "https://api.openai.com/v1";
  }
}

function sanitizeHeaders(headers: Record<string, string> = {}): Record<string, string> {
  return Object.fromEntries(
    Object.entries(headers)
      .map(([key, value]): [string, string] => [key.trim(), value.trim()])
      .filter(([key, value]) => key && value),
  );
}

function buildUserText(input: CategoryInput): string {
  const lines = [`Merchant: ${input.merchantName}`];
  if (input.description?.trim()) {
    lines.push(`Description: ${input.description.trim()}`);
  }
  if (input.amount !== undefined) {
    lines.push(`Amount: ${input.amount.toFixed(2)}`);
  }
  return lines.join("\n");
}

function extractOutputText(payload: ResponsesApiPayload): string | null {
  if (typeof payload.output_text === "string" && payload.output_text.length > 0) {
    return payload.output_text;
  }

  const chunks = (payload.output ?? [])
    .flatMap((entry) => entry.content ?? [])
    .map((content) => content.text)
    .filter((text): text is string => typeof text === "string" && text.length > 0);
  return chunks.length > 0 ? chunks.join("\n") : null;
}

function extractChatCompletionText(payload: ChatCompletionsPayload): string | null {
  const content = payload.choices?.[0]?.message?.content;
  if (typeof content === "string") {
    return content.length > 0 ? content : null;
  }

  const parts = (content ?? [])
    .map((chunk) => chunk.text)
    .filter((text): text is string => typeof text === "string" && text.length > 0);
  return parts.length > 0 ? parts.join("\n") : null;
}

function parseReplyJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    const start = raw.indexOf("{");
    const end = raw.lastIndexOf("}");
    if (start >= 0 && end > start) {
      return JSON.parse(raw.slice(start, end + 1));
    }
    throw new Error(`unable to parse category reply: ${raw.slice(0, 120)}`);
  }
}
