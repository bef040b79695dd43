import { InvalidEndpointError, NoRegionError } from '../errors/index.js';

export interface ResolvedEndpoint {
  regionName: string | undefined;
  endpointUrl: string;
  signingRegion: string | undefined;
  signingName: string;
  signatureVersion: string;
}

export interface EndpointResolver {
  resolve(
    serviceName: string,
    regionName: string | undefined,
    endpointUrl: string | undefined,
    isSecure: boolean,
  ): ResolvedEndpoint;
}

export interface TemplateEndpointResolverOptions {
  /**
   * Hostname template with `{service}` and `{region}` placeholders
   * @default '{service}.{region}.amazonaws.com'
   */
  hostnameTemplate?: string;

  /**
   * Used when the caller gives no region
   */
  defaultRegion?: string;

  /**
   * Per-service signature versions
   */
  signatureVersions?: Record<string, string>;

  /**
   * @default 'bearer'
   */
  defaultSignatureVersion?: string;
}

/**
 * Builds endpoint URLs from a hostname template
 *
 * @example
 * ```typescript
 * const resolver = new TemplateEndpointResolver({
 *   hostnameTemplate: '{service}.{region}.cloud.example.com',
 * });
 * resolver.resolve('queue', 'eu-west-1', undefined, true).endpointUrl;
 * // 'https://queue.eu-west-1.cloud.example.com'
 * ```
 */
export class TemplateEndpointResolver implements EndpointResolver {
  private readonly hostnameTemplate: string;
  private readonly defaultSignatureVersion: string;

  constructor(private readonly options: TemplateEndpointResolverOptions = {}) {
    this.hostnameTemplate = options.hostnameTemplate ?? '{service}.{region}.amazonaws.com';
    this.defaultSignatureVersion = options.defaultSignatureVersion ?? 'bearer';
  }

  /**
   * @throws {NoRegionError} if neither a region nor an endpoint URL is available
   * @throws {InvalidEndpointError} if the endpoint URL override is not an absolute http(s) URL
   */
  resolve(
    serviceName: string,
    regionName: string | undefined,
    endpointUrl: string | undefined,
    isSecure: boolean,
  ): ResolvedEndpoint {
    const region = regionName ?? this.options.defaultRegion;

    let url: string;
    if (endpointUrl !== undefined) {
      if (!URL.canParse(endpointUrl) || !/^https?:$/.test(new URL(endpointUrl).protocol)) {
        throw new InvalidEndpointError(endpointUrl);
      }
      url = endpointUrl;
    } else {
      if (region === undefined) {
        throw new NoRegionError();
      }
      const hostname = this.hostnameTemplate
        .replaceAll('{service}', serviceName)
        .replaceAll('{region}', region);
      url = `${isSecure ? 'https' : 'http'}://${hostname}`;
    }

    return {
      regionName: region,
      endpointUrl: url,
      signingRegion: region,
      signingName: serviceName,
      signatureVersion:
        this.options.signatureVersions?.[serviceName] ?? this.defaultSignatureVersion,
    };
  }
}
