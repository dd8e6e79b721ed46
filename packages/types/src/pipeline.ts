export interface ChunkStageResult {
  articles: number;
  resumedSkipped: number;
  tooShort: number;
  passages: number;
}

export interface UploadResult {
  collection: string;
  created: boolean;
  resumedFrom: number;
  skipped: number;
  uploaded: number;
  malformed: number;
  tokensUsed: number;
  upsertCalls: number;
  finalPointCount: number;
}
