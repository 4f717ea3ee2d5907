export {
  RequestExecutor,
  type FetchFunction,
  type PageRequester,
  type RequestExecutorOptions,
  type RequestOptions,
} from './executor.js';
export { buildUrl } from './query.js';
