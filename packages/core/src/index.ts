export { runChunkStage } from "./chunk-stage.js";
export type { ChunkStageOptions, ChunkStageDependencies } from "./chunk-stage.js";

export { runUpload, prepareCollection, resumeOffset } from "./upload-pipeline.js";
export type { UploadOptions, UploadDependencies, PreparedCollection } from "./upload-pipeline.js";

export { downloadDump } from "./download.js";
export type { DownloadOptions, DownloadDependencies, DownloadResult } from "./download.js";

export { pointId, toPoint } from "./point-id.js";
