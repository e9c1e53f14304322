import { afterEach, describe, it, expect, vi } from "vitest";
import { ProviderError } from "@switchboard/types";
import { OpenAIAdapter } from "./openai-adapter.js";
import { OllamaAdapter } from "./ollama-adapter.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function stubFetch(impl: (url: string, init: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function sentBody(fetchMock: ReturnType<typeof stubFetch>): unknown {
  const init = fetchMock.mock.calls[0][1];
  return JSON.parse(String(init.body));
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("OpenAIAdapter", () => {
  const tools = [
    { name: "create_uuid", description: "Make a uuid", parameters: { type: "object", properties: {} } },
  ];

  it("sends messages and tools, and returns text", async () => {
    const fetchMock = stubFetch(async () =>
      jsonResponse({ choices: [{ message: { role: "assistant", content: "Hello!" } }] }),
    );
    const adapter = new OpenAIAdapter({ apiKey: "test-key", model: "gpt-test", baseUrl: "http://llm.local/v1/" });

    const result = await adapter.generate(
      [
        { role: "system", content: "Be brief." },
        { role: "user", content: "Hi" },
        { role: "assistant", content: "", toolCalls: [{ id: "c-1", name: "create_uuid", arguments: {} }] },
        { role: "tool", toolCallId: "c-1", name: "create_uuid", content: "1234" },
      ],
      { tools },
    );

    expect(result).toEqual({ text: "Hello!" });
    expect(fetchMock.mock.calls[0][0]).toBe("http://llm.local/v1/chat/completions");
    expect(fetchMock.mock.calls[0][1].headers).toMatchObject({ Authorization: "Bearer test-key" });
    expect(sentBody(fetchMock)).toEqual({
      model: "gpt-test",
      temperature: 0.7,
      messages: [
        { role: "system", content: "Be brief." },
        { role: "user", content: "Hi" },
        {
          role: "assistant",
          content: null,
          tool_calls: [{ id: "c-1", type: "function", function: { name: "create_uuid", arguments: "{}" } }],
        },
        { role: "tool", tool_call_id: "c-1", content: "1234" },
      ],
      tools: [
        {
          type: "function",
          function: { name: "create_uuid", description: "Make a uuid", parameters: { type: "object", properties: {} } },
        },
      ],
    });
  });

  it("returns native tool calls with parsed arguments", async () => {
    stubFetch(async () =>
      jsonResponse({
        choices: [
          {
            message: {
              content: null,
              tool_calls: [
                { id: "call_9", type: "function", function: { name: "save_document", arguments: '{"name":"a.md","content":"x"}' } },
              ],
            },
          },
        ],
      }),
    );

    const result = await new OpenAIAdapter({ apiKey: "test-key" }).generate([{ role: "user", content: "save" }]);

    expect(result).toEqual({
      text: "",
      toolCalls: [{ id: "call_9", name: "save_document", arguments: { name: "a.md", content: "x" } }],
    });
  });

  it.each([
    [401, "auth"],
    [403, "auth"],
    [429, "rate_limit"],
    [503, "unavailable"],
    [400, "bad_response"],
  ] as const)("maps HTTP %i to %s", async (status, kind) => {
    stubFetch(async () => jsonResponse({ error: { message: "nope" } }, status));

    const error = await new OpenAIAdapter({ apiKey: "test-key" })
      .generate([{ role: "user", content: "hi" }])
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ kind, status, provider: "openai" });
  });

  it("reports unreachable servers as unavailable", async () => {
    stubFetch(async () => {
      throw new TypeError("fetch failed");
    });

    await expect(
      new OpenAIAdapter({ apiKey: "test-key" }).generate([{ role: "user", content: "hi" }]),
    ).rejects.toMatchObject({ kind: "unavailable", message: "Could not reach openai: fetch failed" });
  });

  it("times out slow providers", async () => {
    stubFetch(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => reject(init.signal?.reason));
        }),
    );

    await expect(
      new OpenAIAdapter({ apiKey: "test-key", timeoutMs: 20 }).generate([{ role: "user", content: "hi" }]),
    ).rejects.toMatchObject({ kind: "timeout", message: "openai did not answer within 20ms" });
  });

  it("rethrows the caller's cancellation unchanged", async () => {
    stubFetch(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => reject(init.signal?.reason));
        }),
    );
    const controller = new AbortController();
    const pending = new OpenAIAdapter({ apiKey: "test-key" }).generate([{ role: "user", content: "hi" }], {
      signal: controller.signal,
    });
    const reason = new Error("session closed");
    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
  });

  it("rejects malformed completions", async () => {
    stubFetch(async () => jsonResponse({ choices: [] }));

    await expect(
      new OpenAIAdapter({ apiKey: "test-key" }).generate([{ role: "user", content: "hi" }]),
    ).rejects.toMatchObject({ kind: "bad_response" });
  });

  it("requires an API key", () => {
    expect(() => new OpenAIAdapter({ apiKey: "" })).toThrow("OpenAI API key is required");
  });
});

describe("OllamaAdapter", () => {
  it("posts to /api/chat and returns text and tool calls", async () => {
    const fetchMock = stubFetch(async () =>
      jsonResponse({
        message: {
          role: "assistant",
          content: "Working on it",
          tool_calls: [{ function: { name: "create_uuid", arguments: {} } }],
        },
        done: true,
      }),
    );

    const result = await new OllamaAdapter({ model: "llama-test" }).generate([{ role: "user", content: "uuid" }]);

    expect(fetchMock.mock.calls[0][0]).toBe("http://localhost:11434/api/chat");
    expect(sentBody(fetchMock)).toEqual({
      model: "llama-test",
      messages: [{ role: "user", content: "uuid" }],
      stream: false,
    });
    expect(result.text).toBe("Working on it");
    expect(result.toolCalls).toHaveLength(1);
    expect(result.toolCalls?.[0]).toMatchObject({ name: "create_uuid", arguments: {} });
  });

  it("maps server errors", async () => {
    stubFetch(async () => new Response("model not loaded", { status: 500 }));

    await expect(new OllamaAdapter().generate([{ role: "user", content: "hi" }])).rejects.toMatchObject({
      kind: "unavailable",
      message: "ollama API error 500: model not loaded",
    });
  });
});
