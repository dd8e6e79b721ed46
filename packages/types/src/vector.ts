export type DistanceMetric = "Cosine" | "Euclid" | "Dot" | "Manhattan";

/** Text handed to the vector index for server-side embedding. */
export interface InferenceDocument {
  text: string;
  model: string;
}

export type PointVector = number[] | InferenceDocument;

export interface PointPayload {
  text: string;
  title: string;
  chunk_index: number;
  passage_id: string;
}

export interface VectorPoint {
  id: string;
  vector: PointVector;
  payload: PointPayload;
}

export interface CollectionState {
  pointCount: number;
  dimension: number;
  distance: DistanceMetric;
  indexingEnabled: boolean;
}

export interface CreateCollectionParams {
  dimension: number;
  distance: DistanceMetric;
  indexingEnabled?: boolean;
  binaryQuantization?: boolean;
}

export interface UpsertOptions {
  wait: boolean;
}
