export { ResolutionContext } from './ResolutionContext.js';
export { AnnotationResolver } from './AnnotationResolver.js';
export { QNameResolver } from './QNameResolver.js';
export type { QNameResolverOptions } from './QNameResolver.js';
export { normalizeQName, NONE_QNAME } from './normalize.js';
export { NATIVE_ATTRIBUTE_TYPES, nativeAttributeType } from './nativeAttributes.js';
