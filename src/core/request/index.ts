/**
 * Request assembly and response decoding
 */
export { buildRequest, selectVariant } from './RequestBuilder.js';
export type { RequestInput } from './RequestBuilder.js';
export { decodeResponse } from './ResponseDecoder.js';
export type { DecodedReply } from './ResponseDecoder.js';
