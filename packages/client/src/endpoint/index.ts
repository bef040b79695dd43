export { Endpoint, EndpointCreator } from './endpoint.js';
export type { CreateEndpointOptions, EndpointHandle, EndpointOptions } from './endpoint.js';
export { TemplateEndpointResolver } from './resolver.js';
export type {
  EndpointResolver,
  ResolvedEndpoint,
  TemplateEndpointResolverOptions,
} from './resolver.js';
export {
  createDefaultEndpointRules,
  EndpointRuleRegistry,
  isDnsCompatibleBucket,
  storageAddressingRule,
} from './rules.js';
export type { EndpointRule, EndpointRuleContext } from './rules.js';
