import { ExternalServiceError } from "@wikindex/errors";
import type { CollectionState, DistanceMetric } from "@wikindex/types";

const DISTANCES: readonly DistanceMetric[] = ["Cosine", "Euclid", "Dot", "Manhattan"];

/** The fields of Qdrant's collection info we read. */
export interface CollectionInfoView {
  points_count?: number | null;
  config: {
    params: { vectors?: unknown };
    optimizer_config: { indexing_threshold?: number | null };
  };
}

interface VectorParamsView {
  size: number;
  distance: DistanceMetric;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isDistance(value: unknown): value is DistanceMetric {
  return DISTANCES.some((d) => d === value);
}

function asVectorParams(value: unknown): VectorParamsView | null {
  if (!isRecord(value)) return null;
  const { size, distance } = value;
  if (typeof size !== "number" || !isDistance(distance)) return null;
  return { size, distance };
}

/** Unnamed vector config, or the first entry of a named one. */
function readVectorParams(vectors: unknown): VectorParamsView | null {
  const direct = asVectorParams(vectors);
  if (direct || !isRecord(vectors)) return direct;
  for (const named of Object.values(vectors)) {
    const params = asVectorParams(named);
    if (params) return params;
  }
  return null;
}

export function toCollectionState(name: string, info: CollectionInfoView): CollectionState {
  const params = readVectorParams(info.config.params.vectors);
  if (!params) {
    throw new ExternalServiceError(`Collection ${name} has no dense vector config`, "qdrant");
  }

  return {
    pointCount: info.points_count ?? 0,
    dimension: params.size,
    distance: params.distance,
    indexingEnabled: info.config.optimizer_config.indexing_threshold !== 0,
  };
}
