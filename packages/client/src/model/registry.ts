import { InvalidServiceDescriptionError, UnknownServiceError } from '../errors/index.js';
import { serviceDescriptionSchema } from '../schemas/service.js';
import type { ServiceDescription } from '../types/index.js';

/**
 * Source of service descriptions
 */
export interface Loader {
  loadServiceModel(serviceName: string, apiVersion?: string): ServiceDescription;
  listAvailableServices(): string[];
}

/**
 * In-memory loader. Descriptions are keyed by endpoint prefix and API
 * version; without an explicit version the latest one is returned.
 *
 * @example
 * ```typescript
 * const registry = new ServiceRegistry().register(storageService);
 * const description = registry.loadServiceModel('s3');
 * ```
 */
export class ServiceRegistry implements Loader {
  private readonly services = new Map<string, Map<string, ServiceDescription>>();

  constructor(descriptions: ServiceDescription[] = []) {
    for (const description of descriptions) {
      this.register(description);
    }
  }

  /**
   * @throws {InvalidServiceDescriptionError} if the description is malformed
   */
  register(description: ServiceDescription): this {
    const result = serviceDescriptionSchema.safeParse(description);
    if (!result.success) {
      const name = description.metadata?.endpointPrefix ?? 'unknown';
      throw new InvalidServiceDescriptionError(name, result.error);
    }

    const { endpointPrefix, apiVersion } = description.metadata;
    const versions = this.services.get(endpointPrefix) ?? new Map<string, ServiceDescription>();
    // Keep the caller's object: blueprints are cached per description object
    versions.set(apiVersion, description);
    this.services.set(endpointPrefix, versions);
    return this;
  }

  /**
   * @throws {UnknownServiceError} if no matching description is registered
   */
  loadServiceModel(serviceName: string, apiVersion?: string): ServiceDescription {
    const versions = this.services.get(serviceName);
    if (!versions) {
      throw new UnknownServiceError(serviceName, this.listAvailableServices());
    }

    const version = apiVersion ?? [...versions.keys()].sort().at(-1);
    const description = version === undefined ? undefined : versions.get(version);
    if (!description) {
      throw new UnknownServiceError(
        `${serviceName}@${apiVersion ?? 'latest'}`,
        this.listAvailableServices(),
      );
    }
    return description;
  }

  listAvailableServices(): string[] {
    return [...this.services.keys()].sort();
  }

  apiVersions(serviceName: string): string[] {
    return [...(this.services.get(serviceName)?.keys() ?? [])].sort();
  }
}
