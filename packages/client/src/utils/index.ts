export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
export { methodNameFor } from './names.js';
export { getPath, isRecord, setPath, toList } from './objects.js';
