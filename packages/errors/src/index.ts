export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  MalformedRecordError,
  UpstreamMissingError,
  DependencyUnavailableError,
  ValidationError,
  ExternalServiceError,
  errorMessage,
} from "./errors.js";
