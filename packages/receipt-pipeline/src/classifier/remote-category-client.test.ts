import { afterEach, describe, expect, it, vi } from "vitest";
import { OpenAiCategoryClient } from "./remote-category-client.js";

type CapturedRequest = { url: string; init?: RequestInit };

function stubFetch(response: () => Response): CapturedRequest[] {
  const requests: CapturedRequest[] = [];
  vi.stubGlobal(
    "fetch",
    vi.fn(async (url: string | URL | Request, init?: RequestInit) => {
      requests.push({ url: String(url), init });
      return response();
    }),
  );
  return requests;
}

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "content-type": "application/json" },
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("OpenAiCategoryClient", () => {
  it("classifies through the responses API with bearer auth", async () => {
    const requests = stubFetch(() =>
      jsonResponse({
        output_text: JSON.stringify({ category: "Travel", confidence: 0.91, reasoning: "hotel stay" }),
      }),
    );
    const client = new OpenAiCategoryClient({
      provider: "openai",
      apiKey: "test-secret",
      model: "gpt-test",
    });

    const reply = await client.classifyCategory({ merchantName: "Seaside Inn", amount: 180 });

    expect(reply).toEqual({ category: "Travel", confidence: 0.91, reasoning: "hotel stay" });
    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe("https://api.openai.com/v1/responses");
    expect(new Headers(requests[0]?.init?.headers).get("authorization")).toBe("Bearer test-secret");

    const body = JSON.parse(String(requests[0]?.init?.body));
    expect(body.model).toBe("gpt-test");
    expect(body.input[1].content[0].text).toBe("Merchant: Seaside Inn\nAmount: 180.00");
  });

  it("classifies through chat completions and coerces string confidences", async () => {
    const requests = stubFetch(() =>
      jsonResponse({
        choices: [
          {
            message: {
              content: JSON.stringify({ category: "Groceries", confidence: "0.7", reasoning: "market" }),
            },
          },
        ],
      }),
    );
    const client = new OpenAiCategoryClient({
      provider: "openrouter",
      apiKey: "test-secret",
      model: "router-test",
      extraHeaders: { "X-Title": " Expense Scan ", " ": "ignored" },
    });

    const reply = await client.classifyCategory({ merchantName: "Fresh Market" });

    expect(reply.category).toBe("Groceries");
    expect(reply.confidence).toBe(0.7);
    expect(requests[0]?.url).toBe("https://openrouter.ai/api/v1/chat/completions");
    expect(requests[0]?.init?.headers).toEqual({
      "content-type": "application/json",
      "X-Title": "Expense Scan",
      authorization: "Bearer test-secret",
    });
  });

  it("extracts a JSON object wrapped in prose", async () => {
    stubFetch(() =>
      jsonResponse({
        choices: [
          {
            message: {
              content: 'Here you go: {"category":"Fitness","confidence":0.8,"reasoning":"gym"} done',
            },
          },
        ],
      }),
    );
    const client = new OpenAiCategoryClient({
      provider: "lmstudio",
      model: "local-test",
      baseUrl: "http://127.0.0.1:9999/v1/",
    });

    const reply = await client.classifyCategory({ merchantName: "Iron Gym" });

    expect(reply.category).toBe("Fitness");
  });

  it("rejects categories outside the closed set", async () => {
    stubFetch(() =>
      jsonResponse({ output_text: JSON.stringify({ category: "Pets", confidence: 0.9 }) }),
    );
    const client = new OpenAiCategoryClient({ apiKey: "test-secret", model: "gpt-test" });

    await expect(client.classifyCategory({ merchantName: "Paws" })).rejects.toThrow(
      "failed validation",
    );
  });

  it("rejects non-2xx responses with the status", async () => {
    stubFetch(() => new Response("rate limited", { status: 429 }));
    const client = new OpenAiCategoryClient({ apiKey: "test-secret", model: "gpt-test" });

    await expect(client.classifyCategory({ merchantName: "Paws" })).rejects.toThrow(
      "category classification failed via responses (openai, 429): rate limited",
    );
  });

  it("rejects replies without usable content", async () => {
    stubFetch(() => jsonResponse({ unexpected: true }));
    const client = new OpenAiCategoryClient({ apiKey: "test-secret", model: "gpt-test" });

    await expect(client.classifyCategory({ merchantName: "Paws" })).rejects.toThrow(
      "category classification returned no content (openai)",
    );
  });
});
