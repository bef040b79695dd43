import { UnknownOperationError } from '../errors/index.js';
import type {
  HttpBinding,
  OperationDefinition,
  PaginatorDefinition,
  Protocol,
  ServiceDescription,
  ServiceMetadata,
} from '../types/index.js';

/**
 * Read-only view of one operation of a service
 */
export class OperationModel {
  constructor(
    public readonly name: string,
    private readonly definition: OperationDefinition,
    public readonly serviceModel: ServiceModel,
  ) {}

  get http(): HttpBinding {
    return this.definition.http;
  }

  get inputShape(): OperationDefinition['input'] {
    return this.definition.input;
  }

  get outputShape(): OperationDefinition['output'] {
    return this.definition.output;
  }

  get hasStreamingInput(): boolean {
    return this.definition.streamingInput !== undefined;
  }

  get streamingInputMember(): string | undefined {
    return this.definition.streamingInput;
  }

  get deprecated(): boolean {
    return this.definition.deprecated ?? false;
  }

  get paginationMetadata(): PaginatorDefinition | undefined {
    return this.serviceModel.paginatorFor(this.name);
  }
}

/**
 * Read-only view of a service description
 */
export class ServiceModel<D extends ServiceDescription = ServiceDescription> {
  private readonly operationCache = new Map<string, OperationModel>();

  constructor(public readonly description: D) {}

  get metadata(): ServiceMetadata {
    return this.description.metadata;
  }

  /**
   * Name the service is registered, resolved and signed under
   */
  get serviceName(): string {
    return this.description.metadata.endpointPrefix;
  }

  get endpointPrefix(): string {
    return this.description.metadata.endpointPrefix;
  }

  get protocol(): Protocol {
    return this.description.metadata.protocol;
  }

  get apiVersion(): string {
    return this.description.metadata.apiVersion;
  }

  get signingName(): string | undefined {
    return this.description.metadata.signingName;
  }

  get signatureVersion(): string | undefined {
    return this.description.metadata.signatureVersion;
  }

  get operationNames(): string[] {
    return Object.keys(this.description.operations);
  }

  /**
   * @throws {UnknownOperationError} if the service has no such operation
   */
  operationModel(name: string): OperationModel {
    const cached = this.operationCache.get(name);
    if (cached) {
      return cached;
    }

    const { operations } = this.description;
    const definition = Object.hasOwn(operations, name) ? operations[name] : undefined;
    if (!definition) {
      throw new UnknownOperationError(name, this.serviceName);
    }

    const model = new OperationModel(name, definition, this);
    this.operationCache.set(name, model);
    return model;
  }

  paginatorFor(operationName: string): PaginatorDefinition | undefined {
    const paginators = this.description.paginators;
    if (!paginators || !Object.hasOwn(paginators, operationName)) {
      return undefined;
    }
    return paginators[operationName];
  }
}
