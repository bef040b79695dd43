import { ResponseParserError, ResponseValidationError } from '../errors/index.js';
import type { OperationModel } from '../model/index.js';
import type {
  ErrorDetails,
  ParsedResponse,
  Protocol,
  ResponseMetadata,
} from '../types/index.js';
import { isRecord } from '../utils/index.js';

/**
 * HTTP response as read off the wire, before parsing
 */
export interface RawHttpResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

export interface ResponseParser {
  parse(response: RawHttpResponse, operationModel: OperationModel): ParsedResponse;
}

export type ResponseParserFactory = (protocol: Protocol) => ResponseParser;

const REQUEST_ID_HEADERS = ['x-amzn-requestid', 'x-amz-request-id', 'x-request-id'];

function stringField(source: Record<string, unknown>, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = source[name];
    if (typeof value === 'string' && value !== '') {
      return value;
    }
  }
  return undefined;
}

abstract class BaseJsonParser implements ResponseParser {
  parse(response: RawHttpResponse, operationModel: OperationModel): ParsedResponse {
    const metadata = this.responseMetadata(response);
    if (response.statusCode >= 300) {
      return { Error: this.errorDetails(response), ResponseMetadata: metadata };
    }

    const body = this.decode(response.body);
    if (body === undefined) {
      throw new ResponseParserError(
        `Unable to parse response for ${operationModel.name}: body is not valid JSON`,
        { statusCode: response.statusCode },
      );
    }

    return { ...this.validate(body, operationModel), ResponseMetadata: metadata };
  }

  /**
   * Error code for a failed response, if the protocol carries one outside the body
   */
  protected abstract codeFromHeaders(headers: Record<string, string>): string | undefined;

  private decode(text: string): Record<string, unknown> | undefined {
    if (text.trim() === '') {
      return {};
    }
    try {
      const value: unknown = JSON.parse(text);
      return isRecord(value) ? value : undefined;
    } catch {
      return undefined;
    }
  }

  private validate(
    body: Record<string, unknown>,
    operationModel: OperationModel,
  ): Record<string, unknown> {
    const schema = operationModel.outputShape;
    if (!schema) {
      return body;
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      throw new ResponseValidationError('API response validation failed', result.error);
    }
    if (!isRecord(result.data)) {
      throw new ResponseValidationError(
        `output shape of ${operationModel.name} must produce an object`,
      );
    }
    return result.data;
  }

  private errorDetails(response: RawHttpResponse): ErrorDetails {
    const decoded = this.decode(response.body);
    const body = decoded ?? {};
    const rawCode =
      this.codeFromHeaders(response.headers) ?? stringField(body, '__type', 'code', 'Code');
    // "com.example#ResourceNotFound" and "ResourceNotFound:http://..." both carry the bare code
    const code = rawCode?.split('#').at(-1)?.split(':')[0];

    return {
      Code: code || String(response.statusCode),
      Message:
        stringField(body, 'message', 'Message', 'errorMessage') ??
        (decoded === undefined ? response.body : ''),
    };
  }

  private responseMetadata(response: RawHttpResponse): ResponseMetadata {
    const requestIdHeader = REQUEST_ID_HEADERS.find((name) => name in response.headers);
    return {
      RequestId: requestIdHeader ? response.headers[requestIdHeader] : undefined,
      HTTPStatusCode: response.statusCode,
      HTTPHeaders: response.headers,
    };
  }
}

export class JsonParser extends BaseJsonParser {
  protected codeFromHeaders(): string | undefined {
    return undefined;
  }
}

export class RestJsonParser extends BaseJsonParser {
  protected codeFromHeaders(headers: Record<string, string>): string | undefined {
    return headers['x-amzn-errortype'] || undefined;
  }
}

/**
 * Create the response parser for a protocol
 */
export function createParser(protocol: Protocol): ResponseParser {
  switch (protocol) {
    case 'json':
      return new JsonParser();
    case 'rest-json':
      return new RestJsonParser();
  }
}
