import { describe, it, expect, vi, beforeEach } from "vitest";
import type OpenAI from "openai";
import { createOpenAiCompatibleClient, toOpenAIMessages } from "./openai-client.js";
import type { LlmClient } from "./llm-client.js";

// ---------------------------------------------------------------------------
// Mock the openai SDK
// ---------------------------------------------------------------------------

const mockCreate = vi.fn();
const constructed: Array<{ kind: string; opts: Record<string, unknown> }> = [];

vi.mock("openai", () => {
  class MockOpenAI {
    chat = { completions: { create: mockCreate } };
    constructor(opts: Record<string, unknown>) {
      constructed.push({ kind: "openai", opts });
    }
  }
  class MockAzureOpenAI {
    chat = { completions: { create: mockCreate } };
    constructor(opts: Record<string, unknown>) {
      constructed.push({ kind: "azure", opts });
    }
  }
  return { default: MockOpenAI, AzureOpenAI: MockAzureOpenAI };
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeCompletion(overrides: Partial<OpenAI.ChatCompletion> = {}): OpenAI.ChatCompletion {
  return {
    id: "chatcmpl-123",
    object: "chat.completion",
    created: 1_700_000_000,
    model: "gpt-4o",
    choices: [
      {
        index: 0,
        message: { role: "assistant", content: "Hello!", refusal: null },
        finish_reason: "stop",
        logprobs: null,
      },
    ],
    usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
    ...overrides,
  } as OpenAI.ChatCompletion;
}

function makeToolCallCompletion(args: string): OpenAI.ChatCompletion {
  return makeCompletion({
    choices: [
      {
        index: 0,
        message: {
          role: "assistant",
          content: null,
          refusal: null,
          tool_calls: [
            { id: "call_abc", type: "function", function: { name: "get_weather", arguments: args } },
          ],
        },
        finish_reason: "tool_calls",
        logprobs: null,
      },
    ],
  });
}

function lastRequest(): Record<string, unknown> {
  return mockCreate.mock.calls[mockCreate.mock.calls.length - 1]?.[0];
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("toOpenAIMessages", () => {
  it("maps every message kind", () => {
    expect(
      toOpenAIMessages([
        { role: "system", content: "sys" },
        { role: "user", content: "Weather in Paris?" },
        {
          role: "assistant",
          content: null,
          toolCalls: [{ id: "c1", toolName: "get_weather", arguments: { location: "Paris" } }],
        },
        { role: "tool", toolCallId: "c1", content: "Sunny" },
        { role: "assistant", content: "It's sunny." },
      ]),
    ).toEqual([
      { role: "system", content: "sys" },
      { role: "user", content: "Weather in Paris?" },
      {
        role: "assistant",
        content: null,
        tool_calls: [
          { id: "c1", type: "function", function: { name: "get_weather", arguments: '{"location":"Paris"}' } },
        ],
      },
      { role: "tool", tool_call_id: "c1", content: "Sunny" },
      { role: "assistant", content: "It's sunny." },
    ]);
  });
});

describe("createOpenAiCompatibleClient", () => {
  let client: LlmClient;

  beforeEach(() => {
    vi.clearAllMocks();
    constructed.length = 0;
    client = createOpenAiCompatibleClient({ provider: "openai", apiKey: "test-key" });
  });

  it("returns text and usage from a basic completion", async () => {
    mockCreate.mockResolvedValueOnce(makeCompletion());

    const result = await client.sendMessage({ messages: [{ role: "user", content: "Hi" }] });

    expect(result).toEqual({ text: "Hello!", toolCalls: undefined, usage: { inputTokens: 10, outputTokens: 5 } });
  });

  it("sends model, max tokens, temperature and tools", async () => {
    mockCreate.mockResolvedValueOnce(makeCompletion());

    await client.sendMessage({
      messages: [{ role: "user", content: "Hi" }],
      tools: [{ name: "get_weather", description: "Weather", parameters: { type: "object" } }],
      temperature: 0.3,
    });

    expect(lastRequest()).toEqual({
      model: "gpt-4o",
      max_tokens: 4096,
      messages: [{ role: "user", content: "Hi" }],
      tools: [{ type: "function", function: { name: "get_weather", description: "Weather", parameters: { type: "object" } } }],
      temperature: 0.3,
    });
  });

  it("forbids tool calls while keeping the tools defined", async () => {
    mockCreate.mockResolvedValueOnce(makeCompletion());

    await client.sendMessage({
      messages: [{ role: "user", content: "Hi" }],
      tools: [{ name: "get_weather", description: "Weather", parameters: { type: "object" } }],
      toolChoice: "none",
    });

    expect(lastRequest()).toMatchObject({
      tools: [{ type: "function", function: { name: "get_weather", description: "Weather", parameters: { type: "object" } } }],
      tool_choice: "none",
    });
  });

  it("sends no tool choice without tools", async () => {
    mockCreate.mockResolvedValueOnce(makeCompletion());

    await client.sendMessage({ messages: [{ role: "user", content: "Hi" }], toolChoice: "none" });

    expect(lastRequest()).not.toHaveProperty("tool_choice");
  });

  it("does not send tools when the list is empty", async () => {
    mockCreate.mockResolvedValueOnce(makeCompletion());

    await client.sendMessage({ messages: [{ role: "user", content: "Hi" }], tools: [] });

    expect(lastRequest().tools).toBeUndefined();
  });

  it("parses tool calls", async () => {
    mockCreate.mockResolvedValueOnce(makeToolCallCompletion('{"location":"Paris"}'));

    const result = await client.sendMessage({ messages: [{ role: "user", content: "weather" }] });

    expect(result.text).toBeNull();
    expect(result.toolCalls).toEqual([{ id: "call_abc", toolName: "get_weather", arguments: { location: "Paris" } }]);
  });

  it("uses empty arguments when the JSON is malformed", async () => {
    mockCreate.mockResolvedValueOnce(makeToolCallCompletion("not-valid-json{{{"));

    const result = await client.sendMessage({ messages: [{ role: "user", content: "weather" }] });

    expect(result.toolCalls).toEqual([{ id: "call_abc", toolName: "get_weather", arguments: {} }]);
  });

  it("uses empty arguments when the JSON is not an object", async () => {
    mockCreate.mockResolvedValueOnce(makeToolCallCompletion("[1,2]"));

    const result = await client.sendMessage({ messages: [{ role: "user", content: "weather" }] });

    expect(result.toolCalls?.[0]?.arguments).toEqual({});
  });

  it("throws when the API call fails", async () => {
    mockCreate.mockRejectedValueOnce(new Error("rate limit exceeded"));

    await expect(client.sendMessage({ messages: [{ role: "user", content: "Hi" }] })).rejects.toThrow(
      "openai API call failed: rate limit exceeded",
    );
  });

  it("throws when no choices are returned", async () => {
    mockCreate.mockResolvedValueOnce(makeCompletion({ choices: [] }));

    await expect(client.sendMessage({ messages: [{ role: "user", content: "Hi" }] })).rejects.toThrow(
      "openai returned no choices in response",
    );
  });

  it("omits usage when the response has none", async () => {
    const completion = makeCompletion();
    delete completion.usage;
    mockCreate.mockResolvedValueOnce(completion);

    const result = await client.sendMessage({ messages: [{ role: "user", content: "Hi" }] });

    expect(result.usage).toBeUndefined();
  });

  it("points OpenRouter at its base URL with its default model", async () => {
    const router = createOpenAiCompatibleClient({ provider: "openrouter", apiKey: "test-key" });
    mockCreate.mockResolvedValueOnce(makeCompletion());

    await router.sendMessage({ messages: [{ role: "user", content: "Hi" }] });

    expect(router.provider).toBe("openrouter");
    expect(constructed[constructed.length - 1]).toEqual({
      kind: "openai",
      opts: { baseURL: "https://openrouter.ai/api/v1", apiKey: "test-key" },
    });
    expect(lastRequest().model).toBe("openai/gpt-4o");
  });

  it("builds an Azure client that targets the deployment", async () => {
    const azure = createOpenAiCompatibleClient({
      provider: "azure",
      apiKey: "test-key",
      endpoint: "https://example.openai.azure.com",
      apiVersion: "2024-12-01-preview",
      deployment: "concierge-gpt4o",
      maxTokens: 1024,
    });
    mockCreate.mockResolvedValueOnce(makeCompletion());

    await azure.sendMessage({ messages: [{ role: "user", content: "Hi" }] });

    expect(constructed[constructed.length - 1]).toEqual({
      kind: "azure",
      opts: {
        apiKey: "test-key",
        endpoint: "https://example.openai.azure.com",
        apiVersion: "2024-12-01-preview",
        deployment: "concierge-gpt4o",
      },
    });
    expect(lastRequest()).toMatchObject({ model: "concierge-gpt4o", max_tokens: 1024 });
  });
});
