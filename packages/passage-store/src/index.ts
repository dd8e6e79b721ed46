export { PassageWriter } from "./passage-writer.js";
export type { OpenWriterOptions } from "./passage-writer.js";
export {
  readPassages,
  countPassages,
  readTitles,
  parsePassageLine,
  assertStoreExists,
  createPassageReadStats,
} from "./passage-reader.js";
export type { ReadPassagesOptions } from "./passage-reader.js";
export { fileExists } from "./fs-utils.js";
export { passageRecordSchema, toRecord, fromRecord, serializePassages } from "./record-schema.js";
