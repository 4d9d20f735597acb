/**
 * @demeter-lint/types - Type definitions shared by the front end, the core and the CLI
 */

// Python syntax tree
export * from './python.js';

// Scopes, definitions, inference contract
export * from './provider.js';

// QNames, provenance, violations, collaborators
export * from './analysis.js';

// Logger contract
export * from './logging.js';
