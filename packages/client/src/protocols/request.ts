import type { RequestContext, RequestRecord, SerializedRequest } from '../types/index.js';

/**
 * Bind a serialized request to an endpoint host and a call context
 */
export function prepareRequestRecord(
  serialized: SerializedRequest,
  options: { endpointUrl: string; userAgent?: string; context: RequestContext },
): RequestRecord {
  const host = options.endpointUrl.replace(/\/+$/, '');
  const headers = { ...serialized.headers };
  if (options.userAgent !== undefined) {
    headers['User-Agent'] = options.userAgent;
  }

  return {
    ...serialized,
    headers,
    url: `${host}${serialized.urlPath}`,
    context: options.context,
  };
}

/**
 * Full request URL including the query string
 */
export function requestUrl(request: RequestRecord): string {
  const query = new URLSearchParams(request.queryString).toString();
  if (!query) {
    return request.url;
  }
  return `${request.url}${request.url.includes('?') ? '&' : '?'}${query}`;
}
