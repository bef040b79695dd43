import { NoCredentialsError, UnknownSignatureVersionError } from '../errors/index.js';
import type { HookEmitter } from '../hooks/index.js';
import type { Credentials, RequestRecord } from '../types/index.js';

export interface SigningContext {
  operationName: string;
  serviceName: string;
  signingName: string;
  signingRegion: string | undefined;
  credentials: Credentials;
}

/**
 * Mutates the request (usually its headers) so the service accepts it
 */
export type SigningAlgorithm = (request: RequestRecord, context: SigningContext) => void;

/**
 * Requests are sent as they are, without credentials
 */
export const UNSIGNED = 'none';

const bearer: SigningAlgorithm = (request, { credentials }) => {
  if (!credentials.token) {
    throw new NoCredentialsError();
  }
  request.headers.Authorization = `Bearer ${credentials.token}`;
};

export const DEFAULT_SIGNING_ALGORITHMS: ReadonlyMap<string, SigningAlgorithm> = new Map([
  ['bearer', bearer],
]);

/**
 * Signs requests of one service with one signature version.
 *
 * Algorithms are looked up by signature version; pass extra ones to
 * support other schemes.
 */
export class RequestSigner {
  private readonly algorithms: ReadonlyMap<string, SigningAlgorithm>;

  constructor(
    public readonly serviceName: string,
    public readonly regionName: string | undefined,
    public readonly signingName: string,
    public readonly signatureVersion: string,
    private readonly credentials: Credentials | undefined,
    private readonly events: HookEmitter,
    algorithms: ReadonlyMap<string, SigningAlgorithm> = DEFAULT_SIGNING_ALGORITHMS,
  ) {
    this.algorithms = algorithms;
  }

  /**
   * Sign `request` in place.
   *
   * @throws {UnknownSignatureVersionError} if no algorithm is registered for the signature version
   * @throws {NoCredentialsError} if the request must be signed but no credentials were given
   */
  sign(operationName: string, request: RequestRecord): void {
    this.events.emit(
      'before-sign',
      {
        serviceName: this.serviceName,
        operationName,
        request,
        signatureVersion: this.signatureVersion,
      },
      { service: this.serviceName, operation: operationName },
    );

    if (this.signatureVersion === UNSIGNED) {
      return;
    }

    const algorithm = this.algorithms.get(this.signatureVersion);
    if (!algorithm) {
      throw new UnknownSignatureVersionError(this.signatureVersion);
    }
    if (!this.credentials) {
      throw new NoCredentialsError();
    }

    algorithm(request, {
      operationName,
      serviceName: this.serviceName,
      signingName: this.signingName,
      signingRegion: this.regionName,
      credentials: this.credentials,
    });
  }
}
