export { DefaultProvenanceOracle } from './ProvenanceOracle.js';
export { FileStubResolver, stubPath, STUBS_DIR } from './StubResolver.js';
export { ProvenanceClassifier, isPrimitive, isProtocolName } from './ProvenanceClassifier.js';
export type { ProvenanceClassifierOptions } from './ProvenanceClassifier.js';
