import { z } from 'zod';
import { defineService } from '../../src/types/index.js';

const bucketSchema = z.object({
  Name: z.string(),
  CreationDate: z.string().optional(),
});

const objectSchema = z.object({
  Key: z.string(),
  Size: z.number().int(),
});

/**
 * Object storage service on the rest-json protocol
 */
export const storageService = defineService({
  metadata: {
    serviceId: 'Storage',
    endpointPrefix: 's3',
    protocol: 'rest-json',
    apiVersion: '2024-01-01',
  },
  operations: {
    ListBuckets: {
      http: {
        method: 'GET',
        requestUri: '/',
        query: { ContinuationToken: 'continuation-token', MaxBuckets: 'max-buckets' },
      },
      input: z
        .object({
          ContinuationToken: z.string().optional(),
          MaxBuckets: z.number().int().positive().optional(),
        })
        .strict(),
      output: z.object({
        Buckets: z.array(bucketSchema),
        ContinuationToken: z.string().optional(),
      }),
    },
    ListObjects: {
      http: {
        method: 'GET',
        requestUri: '/{Bucket}?list-type=2',
        query: { Prefix: 'prefix', ContinuationToken: 'continuation-token' },
      },
      input: z.object({
        Bucket: z.string().min(3),
        Prefix: z.string().optional(),
        ContinuationToken: z.string().optional(),
      }),
      output: z.object({
        Contents: z.array(objectSchema).default([]),
        NextContinuationToken: z.string().optional(),
        IsTruncated: z.boolean().optional(),
      }),
    },
    GetObject: {
      http: { method: 'GET', requestUri: '/{Bucket}/{Key+}' },
      input: z.object({ Bucket: z.string().min(3), Key: z.string().min(1) }),
      output: z.object({ Key: z.string(), Body: z.string() }),
    },
    PutObject: {
      http: {
        method: 'PUT',
        requestUri: '/{Bucket}/{Key+}',
        headers: { ContentType: 'Content-Type' },
      },
      input: z.object({
        Bucket: z.string().min(3),
        Key: z.string().min(1),
        Body: z.union([z.string(), z.instanceof(Uint8Array)]),
        ContentType: z.string().optional(),
      }),
      output: z.object({ ETag: z.string().optional() }),
      streamingInput: 'Body',
    },
    DeleteBucket: {
      http: { method: 'DELETE', requestUri: '/{Bucket}' },
      input: z.object({ Bucket: z.string().min(3) }),
      deprecated: true,
    },
  },
  paginators: {
    ListBuckets: {
      inputToken: 'ContinuationToken',
      outputToken: 'ContinuationToken',
      resultKey: 'Buckets',
      limitKey: 'MaxBuckets',
    },
    ListObjects: {
      inputToken: 'ContinuationToken',
      outputToken: 'NextContinuationToken',
      resultKey: 'Contents',
      moreResults: 'IsTruncated',
    },
  },
});

/**
 * Message queue service on the json protocol
 */
export const queueService = defineService({
  metadata: {
    serviceId: 'Queue',
    endpointPrefix: 'queue',
    protocol: 'json',
    apiVersion: '2023-06-01',
    targetPrefix: 'QueueService',
    jsonVersion: '1.1',
    signatureVersion: 'none',
  },
  operations: {
    SendMessage: {
      http: { method: 'POST', requestUri: '/' },
      input: z.object({ QueueUrl: z.string().url(), MessageBody: z.string().min(1) }),
      output: z.object({ MessageId: z.string() }),
    },
    ListQueues: {
      http: { method: 'POST', requestUri: '/' },
      input: z.object({
        NextToken: z.string().optional(),
        MaxResults: z.number().int().optional(),
      }),
      output: z.object({
        QueueUrls: z.array(z.string()).default([]),
        NextToken: z.string().optional(),
      }),
    },
  },
  paginators: {
    ListQueues: {
      inputToken: 'NextToken',
      outputToken: 'NextToken',
      resultKey: 'QueueUrls',
      limitKey: 'MaxResults',
    },
  },
});

export const STORAGE_URL = 'http://localhost:4566';
export const QUEUE_URL = 'http://localhost:4576';
