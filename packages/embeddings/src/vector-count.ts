import { ExternalServiceError } from "@wikindex/errors";
import type { EmbeddingResult } from "@wikindex/types";

export function assertVectorCount(result: EmbeddingResult, expected: number, service: string): void {
  if (result.embeddings.length !== expected) {
    throw new ExternalServiceError(
      `${service} returned ${result.embeddings.length} vectors for ${expected} texts`,
      service,
      { details: { model: result.model } },
    );
  }
}
