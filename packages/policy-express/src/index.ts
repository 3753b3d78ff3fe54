// Types
export type { MiddlewareOptions, RequestPolicyInfo } from './types.js';

// Express middleware
export { tollgateMiddleware, extractPolicyRequest } from './middleware.js';
