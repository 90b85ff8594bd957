/**
 * Barrel export for the principle checkers.
 */

export { srpChecker, categorizeMethod, analyzeResponsibilities, isLoggingCall } from './srp.js';
export type { Responsibility } from './srp.js';
export { ocpChecker, isOpenForExtension, isClosedForModification } from './ocp.js';
export {
  lspChecker,
  findBaseClass,
  checkSubstitutability,
  isReturnTypeCovariant,
  isParameterAssignable,
} from './lsp.js';
export type { Substitutability } from './lsp.js';
export { ispChecker, categorizeByPrefix } from './isp.js';
export type { MethodCategory } from './isp.js';
export { dipChecker, dependencyTypes } from './dip.js';
