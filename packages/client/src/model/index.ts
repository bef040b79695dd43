export { OperationModel, ServiceModel } from './service-model.js';
export { ServiceRegistry } from './registry.js';
export type { Loader } from './registry.js';
