export { Paginator, type FetchAllOptions } from './paginator.js';
export { parsePageResponse, parseContinuation } from './response.js';
