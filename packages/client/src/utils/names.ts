/**
 * Method name generated for an operation: `ListBuckets` -> `listBuckets`
 */
export function methodNameFor(operationName: string): string {
  return operationName.charAt(0).toLowerCase() + operationName.slice(1);
}
