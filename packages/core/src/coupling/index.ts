export {
  StructuralCouplingAnalyzer,
  MIN_CHAIN_LENGTH,
  MAX_SELF_CHAIN_LENGTH,
} from './StructuralCouplingAnalyzer.js';
export type {
  CouplingPolicy,
  CouplingCollaborators,
  StructuralCouplingAnalyzerOptions,
} from './StructuralCouplingAnalyzer.js';
export { CouplingChecker } from './CouplingChecker.js';
export type { CouplingCheckerOptions } from './CouplingChecker.js';
