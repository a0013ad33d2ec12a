export { CircleCiClient, DEFAULT_CIRCLECI_BASE_URL } from './circleci';
export type { CircleCiApi, CircleCiClientOptions } from './circleci';
export {
  DEFAULT_RETRY_POLICY,
  HttpError,
  ResponseSizeLimitError,
  executeWithRetries,
  getWithRetries,
  requestBuffer,
} from './utils/http';
export type { HttpRequestOptions, HttpResponse, RetryNotice, RetryPolicy } from './utils/http';
