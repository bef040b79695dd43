import { ParamValidationError } from '../errors/index.js';
import type { OperationModel } from '../model/index.js';
import type {
  Protocol,
  RequestBody,
  RequestContext,
  SerializedRequest,
} from '../types/index.js';
import { isRecord } from '../utils/index.js';

export interface Serializer {
  readonly protocol: Protocol;
  readonly validateParams: boolean;

  /**
   * @throws {ParamValidationError} if validation is enabled and the params do not match
   */
  build(
    params: Record<string, unknown>,
    operationModel: OperationModel,
    context: RequestContext,
  ): SerializedRequest;
}

const LABEL_PATTERN = /\{([^}+]+)(\+)?\}/g;
const BODYLESS_METHODS = new Set(['GET', 'HEAD', 'DELETE']);

function stringify(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(stringify).join(',');
  }
  return JSON.stringify(value);
}

function isRequestBody(value: unknown): value is RequestBody {
  return typeof value === 'string' || value instanceof Uint8Array;
}

/**
 * Shared parameter validation for all protocols
 */
abstract class BaseSerializer implements Serializer {
  abstract readonly protocol: Protocol;

  constructor(public readonly validateParams: boolean) {}

  build(
    params: Record<string, unknown>,
    operationModel: OperationModel,
    context: RequestContext,
  ): SerializedRequest {
    const validated = this.validate(params, operationModel);
    return this.serialize(validated, operationModel, context);
  }

  protected abstract serialize(
    params: Record<string, unknown>,
    operationModel: OperationModel,
    context: RequestContext,
  ): SerializedRequest;

  /**
   * Validate params against the operation's input schema
   * @throws {ParamValidationError} if validation fails
   */
  protected validate(
    params: Record<string, unknown>,
    operationModel: OperationModel,
  ): Record<string, unknown> {
    const schema = operationModel.inputShape;
    if (!this.validateParams || !schema) {
      return params;
    }

    const result = schema.safeParse(params);
    if (!result.success) {
      throw new ParamValidationError(result.error);
    }
    if (!isRecord(result.data)) {
      throw new ParamValidationError(
        `input shape of ${operationModel.name} must produce an object`,
      );
    }
    return result.data;
  }
}

/**
 * `json` protocol: every call is a POST to `/` naming the operation in a
 * target header, with the params as the JSON body.
 */
export class JsonSerializer extends BaseSerializer {
  readonly protocol = 'json';

  protected serialize(
    params: Record<string, unknown>,
    operationModel: OperationModel,
  ): SerializedRequest {
    const { metadata } = operationModel.serviceModel;
    const target = `${metadata.targetPrefix ?? metadata.serviceId}.${operationModel.name}`;

    return {
      urlPath: '/',
      queryString: {},
      method: 'POST',
      headers: {
        'X-Amz-Target': target,
        'Content-Type': `application/x-amz-json-${metadata.jsonVersion ?? '1.0'}`,
      },
      body: JSON.stringify(params),
    };
  }
}

/**
 * `rest-json` protocol: params are placed into URI labels, headers and the
 * query string as the operation's HTTP binding says. Remaining params go to
 * the query string for GET/HEAD/DELETE and to a JSON body otherwise.
 */
export class RestJsonSerializer extends BaseSerializer {
  readonly protocol = 'rest-json';

  protected serialize(
    params: Record<string, unknown>,
    operationModel: OperationModel,
  ): SerializedRequest {
    const { http } = operationModel;
    const remaining = new Map(
      Object.entries(params).filter(([, value]) => value !== undefined),
    );

    const [uriTemplate = '/', staticQuery] = http.requestUri.split('?', 2);
    const urlPath = uriTemplate.replace(LABEL_PATTERN, (_match, name: string, greedy?: string) => {
      const value = remaining.get(name);
      if (value === undefined) {
        throw new ParamValidationError(`Missing required URI label: ${name}`);
      }
      remaining.delete(name);
      const text = stringify(value);
      return greedy
        ? text.split('/').map(encodeURIComponent).join('/')
        : encodeURIComponent(text);
    });

    const queryString: Record<string, string> = {};
    for (const [key, value] of new URLSearchParams(staticQuery ?? '')) {
      queryString[key] = value;
    }
    for (const [name, queryName] of Object.entries(http.query ?? {})) {
      const value = remaining.get(name);
      if (value !== undefined) {
        queryString[queryName] = stringify(value);
        remaining.delete(name);
      }
    }

    const headers: Record<string, string> = {};
    for (const [name, headerName] of Object.entries(http.headers ?? {})) {
      const value = remaining.get(name);
      if (value !== undefined) {
        headers[headerName] = stringify(value);
        remaining.delete(name);
      }
    }

    let body: RequestBody | undefined;
    const streamingMember = operationModel.streamingInputMember;
    if (streamingMember !== undefined) {
      const payload = remaining.get(streamingMember);
      remaining.delete(streamingMember);
      if (payload !== undefined) {
        if (!isRequestBody(payload)) {
          throw new ParamValidationError(
            `${streamingMember} must be a string or a Uint8Array`,
          );
        }
        body = payload;
        headers['Content-Type'] ??= 'application/octet-stream';
      }
    }

    if (BODYLESS_METHODS.has(http.method)) {
      for (const [name, value] of remaining) {
        queryString[name] = stringify(value);
      }
    } else if (body === undefined && remaining.size > 0) {
      body = JSON.stringify(Object.fromEntries(remaining));
      headers['Content-Type'] = 'application/json';
    }

    return { urlPath, queryString, method: http.method, headers, body };
  }
}

/**
 * Create the serializer for a protocol
 */
export function createSerializer(protocol: Protocol, validateParams = true): Serializer {
  switch (protocol) {
    case 'json':
      return new JsonSerializer(validateParams);
    case 'rest-json':
      return new RestJsonSerializer(validateParams);
  }
}
