/**
 * Remote library service client
 */

export {
  createBookdropClient,
  FINALIZE_ALL_PAGE_SIZE,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from './bookdrop-client.js';
export type {
  BookdropClient,
  BookdropClientConfig,
  CallOptions,
  FetchLike,
  ListStagedParams,
} from './bookdrop-client.js';
export { classifyErrorResponse, classifyRequestError } from './errors.js';
