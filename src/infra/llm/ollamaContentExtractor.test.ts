import { afterEach, describe, expect, it, vi } from "vitest";
import {
  EXTRACTION_PREAMBLE,
  OllamaContentExtractor,
} from "./ollamaContentExtractor";

const chatReply = (content: string): Response =>
  new Response(JSON.stringify({ message: { role: "assistant", content } }), {
    status: 200,
  });

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("OllamaContentExtractor", () => {
  it("sends a schema-constrained chat request and returns the content field", async () => {
    const bodies: unknown[] = [];
    const urls: string[] = [];
    vi.stubGlobal("fetch", async (input: string, init?: RequestInit) => {
      urls.push(input);
      bodies.push(JSON.parse(String(init?.body)));
      return chatReply(JSON.stringify({ content: "Main article text" }));
    });

    const extractor = new OllamaContentExtractor(
      "http://ollama.test/",
      "test-model",
      500,
    );
    const result = await extractor.extract("Home Main article text Footer");

    expect(result._unsafeUnwrap()).toEqual({ content: "Main article text" });
    expect(urls).toEqual(["http://ollama.test/api/chat"]);
    expect(bodies[0]).toEqual({
      model: "test-model",
      stream: false,
      format: {
        type: "object",
        properties: { content: { type: "string" } },
        required: ["content"],
      },
      messages: [
        { role: "system", content: EXTRACTION_PREAMBLE },
        { role: "user", content: "Home Main article text Footer" },
      ],
    });
  });

  it("rejects replies that are not JSON", async () => {
    vi.stubGlobal("fetch", async () => chatReply("Sure! Here is the content"));

    const result = await new OllamaContentExtractor(
      "http://ollama.test",
      "test-model",
      500,
    ).extract("text");

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected invalid json error");
    }
    expect(result.error.source).toBe("llm");
    expect(result.error.code).toBe("invalid_json");
  });

  it("rejects replies without a string content attribute", async () => {
    vi.stubGlobal("fetch", async () =>
      chatReply(JSON.stringify({ text: "wrong field" })),
    );

    const result = await new OllamaContentExtractor(
      "http://ollama.test",
      "test-model",
      500,
    ).extract("text");

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected malformed response");
    }
    expect(result.error.code).toBe("malformed_response");
    expect(result.error.message).toBe(
      "Ollama reply did not contain a string 'content' attribute.",
    );
  });

  it("maps transport status failures through the shared boundary mapping", async () => {
    vi.stubGlobal("fetch", async () => new Response("nope", { status: 403 }));

    const result = await new OllamaContentExtractor(
      "http://ollama.test",
      "test-model",
      500,
    ).extract("text");

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected auth error");
    }
    expect(result.error).toMatchObject({
      source: "llm",
      code: "auth_invalid",
      provider: "ollama",
      operation: "extract_content",
      httpStatus: 403,
    });
  });
});
