import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  ContentExtractorPort,
  ExtractedContent,
} from "../../core/ports/outboundPorts";
import { fromHttpError } from "../http/boundaryError";
import { HttpClient } from "../http/httpClient";

export const EXTRACTION_PREAMBLE =
  "Cleanup the content in the given text to only have the main content. Return a json data structure with a 'content' attribute set only.";

const chatResponseSchema = z.object({
  message: z.object({ content: z.string() }),
});

const extractedContentSchema = z.object({ content: z.string() });

/**
 * Asks a local chat model for the main content of noisy page text, constrained to a one-field JSON schema.
 */
export class OllamaContentExtractor implements ContentExtractorPort {
  constructor(
    private readonly baseUrl: string,
    private readonly model: string,
    private readonly timeoutMs = 180_000,
    private readonly httpClient = new HttpClient(),
  ) {}

  async extract(
    text: string,
    signal?: AbortSignal,
  ): Promise<Result<ExtractedContent, AppBoundaryError>> {
    const operation = "extract_content";
    const response = await this.httpClient.requestJson({
      url: `${this.baseUrl.replace(/\/+$/, "")}/api/chat`,
      method: "POST",
      headers: { "content-type": "application/json" },
      body: {
        model: this.model,
        stream: false,
        format: {
          type: "object",
          properties: { content: { type: "string" } },
          required: ["content"],
        },
        messages: [
          { role: "system", content: EXTRACTION_PREAMBLE },
          { role: "user", content: text },
        ],
      },
      timeoutMs: this.timeoutMs,
      retries: 1,
      retryDelayMs: 500,
      signal,
    });

    if (response.isErr()) {
      return err(fromHttpError("llm", "ollama", operation, response.error));
    }

    const chat = chatResponseSchema.safeParse(response.value);
    if (!chat.success) {
      return err(
        this.malformed(
          operation,
          "Ollama chat payload did not contain message.content.",
          chat.error,
        ),
      );
    }

    let structured: unknown;
    try {
      structured = JSON.parse(chat.data.message.content);
    } catch (error) {
      return err({
        source: "llm",
        code: "invalid_json",
        provider: "ollama",
        operation,
        message: "Ollama reply was not valid JSON.",
        retryable: false,
        cause: error,
      });
    }

    const extracted = extractedContentSchema.safeParse(structured);
    if (!extracted.success) {
      return err(
        this.malformed(
          operation,
          "Ollama reply did not contain a string 'content' attribute.",
          extracted.error,
        ),
      );
    }

    return ok({ content: extracted.data.content });
  }

  private malformed(
    operation: string,
    message: string,
    cause: unknown,
  ): AppBoundaryError {
    return {
      source: "llm",
      code: "malformed_response",
      provider: "ollama",
      operation,
      message,
      retryable: false,
      cause,
    };
  }
}
