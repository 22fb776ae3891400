import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { EmbeddingPort } from "../../core/ports/outboundPorts";
import { fromHttpError } from "../http/boundaryError";
import { HttpClient } from "../http/httpClient";

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

/**
 * Fills the embedding column of stored rows; vectors are checked against the column dimension before use.
 */
export class OllamaEmbedding implements EmbeddingPort {
  constructor(
    private readonly baseUrl: string,
    private readonly model: string,
    private readonly expectedDimension: number,
    private readonly timeoutMs = 30_000,
    private readonly httpClient = new HttpClient(),
    private readonly batchSize = 64,
  ) {}

  /**
   * Sends at most `batchSize` texts per request; the first failing batch fails the call.
   */
  async embedTexts(
    texts: string[],
  ): Promise<Result<number[][], AppBoundaryError>> {
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = await this.embedBatch(
        texts.slice(start, start + this.batchSize),
        start,
      );
      if (batch.isErr()) {
        return err(batch.error);
      }
      vectors.push(...batch.value);
    }

    return ok(vectors);
  }

  private async embedBatch(
    texts: string[],
    offset: number,
  ): Promise<Result<number[][], AppBoundaryError>> {
    const operation = "embed_texts";
    const response = await this.httpClient.requestJson({
      url: `${this.baseUrl.replace(/\/+$/, "")}/api/embed`,
      method: "POST",
      headers: { "content-type": "application/json" },
      body: { model: this.model, input: texts },
      timeoutMs: this.timeoutMs,
      retries: 2,
      retryDelayMs: 300,
    });

    if (response.isErr()) {
      return err(fromHttpError("embedding", "ollama", operation, response.error));
    }

    const parsed = embedResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(
        this.failure(
          operation,
          "malformed_response",
          "Ollama embedding payload did not contain an embeddings array.",
        ),
      );
    }

    const vectors = parsed.data.embeddings;
    if (vectors.length !== texts.length) {
      return err(
        this.failure(
          operation,
          "malformed_response",
          `Ollama embedding response size mismatch. Expected ${texts.length}, got ${vectors.length}.`,
        ),
      );
    }

    for (const [batchIndex, vector] of vectors.entries()) {
      const index = offset + batchIndex;
      if (vector.length !== this.expectedDimension) {
        return err(
          this.failure(
            operation,
            "dimension_mismatch",
            `Embedding dimension mismatch for index ${index}. Expected ${this.expectedDimension}, got ${vector.length}.`,
          ),
        );
      }

      if (vector.some((value) => !Number.isFinite(value))) {
        return err(
          this.failure(
            operation,
            "validation_error",
            `Embedding vector contains non-finite values at index ${index}.`,
          ),
        );
      }
    }

    return ok(vectors);
  }

  private failure(
    operation: string,
    code: AppBoundaryError["code"],
    message: string,
  ): AppBoundaryError {
    return {
      source: "embedding",
      code,
      provider: "ollama",
      operation,
      message,
      retryable: false,
    };
  }
}
