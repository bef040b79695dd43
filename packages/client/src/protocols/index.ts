export { createParser, JsonParser, RestJsonParser } from './parser.js';
export type { RawHttpResponse, ResponseParser, ResponseParserFactory } from './parser.js';
export { prepareRequestRecord, requestUrl } from './request.js';
export { createSerializer, JsonSerializer, RestJsonSerializer } from './serializer.js';
export type { Serializer } from './serializer.js';
