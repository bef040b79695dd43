import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import {
  ClientCreationError,
  ConfigValidationError,
  EndpointConnectionError,
  InvalidEndpointError,
  InvalidServiceDescriptionError,
  NimbusError,
  NoCredentialsError,
  NoRegionError,
  OperationNotPageableError,
  ParamValidationError,
  ReadTimeoutError,
  ResponseValidationError,
  ServiceError,
  SessionClosedError,
  UnknownOperationError,
  UnknownServiceError,
} from '../../src/errors/index.js';
import type { ParsedResponse } from '../../src/types/index.js';

function errorResponse(code: string | undefined, message: string, status: number): ParsedResponse {
  return {
    Error: code === undefined ? undefined : { Code: code, Message: message },
    ResponseMetadata: { HTTPStatusCode: status, HTTPHeaders: {} },
  };
}

describe('Error Classes', () => {
  describe('NimbusError', () => {
    it('should create base error with message', () => {
      const error = new NimbusError('Test error');

      expect(error.message).toBe('Test error');
      expect(error.name).toBe('NimbusError');
      expect(error.retryable).toBe(false);
      expect(error.statusCode).toBeUndefined();
    });

    it('should support retryable flag, status code and cause', () => {
      const cause = new Error('Original error');
      const error = new NimbusError('Test error', { retryable: true, statusCode: 500, cause });

      expect(error.retryable).toBe(true);
      expect(error.statusCode).toBe(500);
      expect(error.cause).toBe(cause);
    });

    it('should be the base of every client error', () => {
      const errors = [
        new ClientCreationError('x'),
        new NoRegionError(),
        new NoCredentialsError(),
        new SessionClosedError(),
        new UnknownOperationError('Nope', 's3'),
      ];

      for (const error of errors) {
        expect(error).toBeInstanceOf(Error);
        expect(error).toBeInstanceOf(NimbusError);
      }
    });
  });

  describe('ServiceError', () => {
    it('should describe the service error', () => {
      const response = errorResponse('NoSuchBucket', 'The bucket does not exist', 404);
      const error = new ServiceError(response, 'GetObject');

      expect(error.message).toBe(
        'An error occurred (NoSuchBucket) when calling the GetObject operation: The bucket does not exist',
      );
      expect(error.name).toBe('ServiceError');
      expect(error.code).toBe('NoSuchBucket');
      expect(error.operationName).toBe('GetObject');
      expect(error.statusCode).toBe(404);
      expect(error.response).toBe(response);
      expect(error.retryable).toBe(false);
    });

    it.each([429, 500, 502, 503, 504])('should be retryable for %i', (status) => {
      expect(new ServiceError(errorResponse('Busy', 'Try again', status), 'ListBuckets').retryable).toBe(
        true,
      );
    });

    it('should fall back to Unknown without error details', () => {
      const error = new ServiceError(errorResponse(undefined, '', 500), 'ListBuckets');

      expect(error.message).toBe(
        'An error occurred (Unknown) when calling the ListBuckets operation: Unknown',
      );
      expect(error.code).toBe('Unknown');
    });
  });

  describe('ParamValidationError', () => {
    it('should report zod issues with their paths', () => {
      const result = z.object({ Bucket: z.string(), Key: z.string() }).safeParse({ Key: 1 });
      if (result.success) {
        throw new Error('expected validation to fail');
      }

      const error = new ParamValidationError(result.error);

      expect(error.report).toBe('Bucket: Required, Key: Expected string, received number');
      expect(error.message).toBe(
        'Parameter validation failed: Bucket: Required, Key: Expected string, received number',
      );
      expect(error.validationErrors).toBe(result.error);
      expect(error.retryable).toBe(false);
    });

    it('should accept a plain report', () => {
      const error = new ParamValidationError('Missing required URI label: Bucket');

      expect(error.message).toBe('Parameter validation failed: Missing required URI label: Bucket');
      expect(error.validationErrors).toBeUndefined();
    });
  });

  describe('ResponseValidationError', () => {
    it('should format validation details', () => {
      const result = z.object({ Buckets: z.array(z.string()) }).safeParse({ Buckets: 'none' });
      if (result.success) {
        throw new Error('expected validation to fail');
      }

      const error = new ResponseValidationError('API response validation failed', result.error);

      expect(error.getValidationDetails()).toBe(
        'API response validation failed - Buckets: Expected array, received string',
      );
    });
  });

  describe('ConfigValidationError', () => {
    it('should carry the offending key and expected type', () => {
      const error = new ConfigValidationError('limit', 'limit value must be a positive integer', 'a positive integer');

      expect(error.key).toBe('limit');
      expect(error.expectedType).toBe('a positive integer');
      expect(error.retryable).toBe(false);
    });
  });

  describe('transport errors', () => {
    it('should make EndpointConnectionError retryable', () => {
      const cause = new Error('connect ECONNREFUSED');
      const error = new EndpointConnectionError('http://localhost:4566/', cause);

      expect(error.message).toBe('Could not connect to the endpoint URL: "http://localhost:4566/"');
      expect(error.endpointUrl).toBe('http://localhost:4566/');
      expect(error.retryable).toBe(true);
      expect(error.cause).toBe(cause);
    });

    it('should make ReadTimeoutError retryable', () => {
      const error = new ReadTimeoutError('http://localhost:4566/');

      expect(error.message).toBe('Read timeout on endpoint URL: "http://localhost:4566/"');
      expect(error.retryable).toBe(true);
    });

    it('should not make SessionClosedError retryable', () => {
      const error = new SessionClosedError();

      expect(error.message).toBe('The transport session is closed');
      expect(error.retryable).toBe(false);
    });
  });

  describe('caller errors', () => {
    it('should name the unknown operation and service', () => {
      expect(new UnknownOperationError('Nope', 's3').message).toBe(
        'Operation "Nope" is not defined for service "s3"',
      );
    });

    it('should name the operation that cannot be paginated', () => {
      expect(new OperationNotPageableError('getObject').message).toBe(
        'Operation cannot be paginated: getObject',
      );
    });

    it('should list the known services', () => {
      expect(new UnknownServiceError('blob', ['queue', 's3']).message).toBe(
        'Unknown service: "blob". Valid service names are: queue, s3',
      );
      expect(new UnknownServiceError('blob', []).message).toBe(
        'Unknown service: "blob". Valid service names are: (none)',
      );
    });

    it('should describe resolution failures', () => {
      expect(new NoRegionError().message).toBe('You must specify a region.');
      expect(new InvalidEndpointError('ftp://files').message).toBe('Invalid endpoint: ftp://files');
    });

    it('should describe an invalid service description', () => {
      expect(new InvalidServiceDescriptionError('s3').message).toBe(
        'Invalid service description for "s3"',
      );
    });
  });
});
