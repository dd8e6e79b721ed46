export {
  readArticles,
  createDumpReadStats,
  isRedirect,
  MAIN_NAMESPACE,
} from "./dump-reader.js";
export type { ReadArticlesOptions } from "./dump-reader.js";
export { openDump, detectCompression } from "./open-dump.js";
export type { DumpCompression } from "./open-dump.js";
export { decodeXmlEntities } from "./xml-entities.js";
