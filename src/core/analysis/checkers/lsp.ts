/**
 * Liskov substitution checker.
 *
 * Compares a class against the same-file class named by its first base type.
 * Every base method must be overridden with a matching, override-marked
 * signature whose return type is covariant and whose parameters are assignable.
 * Checks that need an unresolved symbol yield "unknown" instead of a verdict;
 * a class with unknown methods and no definite violation is skipped.
 */

import type { Evidence, CheckContext, PrincipleChecker } from '../types.js';
import type { Declaration, Member, SymbolTable, TypeRef } from '../../../source/types.js';
import { methodsOf } from '../../../source/types.js';
import { isSameOrDescendant } from '../../../source/symbols.js';
import { evidenceFor } from '../store.js';

// ---------------------------------------------------------------------------
// Verdicts
// ---------------------------------------------------------------------------

export type Substitutability =
  | { status: 'substitutable' }
  | { status: 'violating'; reason: string }
  | { status: 'unknown'; reason: string };

type Check = 'pass' | 'fail' | 'unknown';

const SUBSTITUTABLE: Substitutability = { status: 'substitutable' };

function typeText(ref: TypeRef | undefined): string {
  return ref?.text ?? '';
}

// ---------------------------------------------------------------------------
// Base resolution
// ---------------------------------------------------------------------------

/**
 * Same-file class whose name equals the first base reference's text.
 */
export function findBaseClass(declaration: Declaration, declarations: readonly Declaration[]): Declaration | undefined {
  const [firstBase] = declaration.baseTypes;
  if (!firstBase) return undefined;

  return declarations.find(
    (d) => d.kind === 'class' && d !== declaration && d.name === firstBase.text
  );
}

// ---------------------------------------------------------------------------
// Signature checks
// ---------------------------------------------------------------------------

function findMatchingOverride(baseMethod: Member, derivedMethods: readonly Member[]): Member | undefined {
  return derivedMethods.find(
    (m) => m.name === baseMethod.name
      && m.parameters.length === baseMethod.parameters.length
      && m.parameters.every((p, i) => p.type.text === baseMethod.parameters[i]?.type.text)
  );
}

export function isReturnTypeCovariant(symbols: SymbolTable, base: TypeRef | undefined, derived: TypeRef | undefined): Check {
  if (typeText(base) === typeText(derived)) return 'pass';

  const baseSymbol = base?.symbol;
  const derivedSymbol = derived?.symbol;
  if (baseSymbol === undefined || derivedSymbol === undefined) return 'unknown';

  return isSameOrDescendant(symbols, derivedSymbol, baseSymbol) ? 'pass' : 'fail';
}

/**
 * The derived parameter must equal the base parameter or descend from it.
 */
export function isParameterAssignable(symbols: SymbolTable, base: TypeRef, derived: TypeRef): Check {
  if (base.symbol === undefined || derived.symbol === undefined) return 'unknown';
  return isSameOrDescendant(symbols, derived.symbol, base.symbol) ? 'pass' : 'fail';
}

function checkMethod(symbols: SymbolTable, baseMethod: Member, derivedMethods: readonly Member[]): Substitutability {
  const derivedMethod = findMatchingOverride(baseMethod, derivedMethods);
  if (!derivedMethod) {
    return { status: 'violating', reason: `${baseMethod.name}() is not overridden with a matching signature` };
  }
  if (!derivedMethod.modifiers.has('override')) {
    return { status: 'violating', reason: `${baseMethod.name}() is redefined without an override marker` };
  }

  let unknownReason: string | undefined;

  const returnCheck = isReturnTypeCovariant(symbols, baseMethod.returnType, derivedMethod.returnType);
  if (returnCheck === 'fail') {
    return {
      status: 'violating',
      reason: `${baseMethod.name}() returns ${typeText(derivedMethod.returnType)}, not covariant with ${typeText(baseMethod.returnType)}`,
    };
  }
  if (returnCheck === 'unknown') {
    unknownReason = `return type of ${baseMethod.name}() could not be resolved`;
  }

  for (const [i, baseParam] of baseMethod.parameters.entries()) {
    const derivedParam = derivedMethod.parameters[i];
    if (!derivedParam) continue;

    const paramCheck = isParameterAssignable(symbols, baseParam.type, derivedParam.type);
    if (paramCheck === 'fail') {
      return {
        status: 'violating',
        reason: `parameter ${derivedParam.name} of ${baseMethod.name}() is not assignable to ${baseParam.type.text}`,
      };
    }
    if (paramCheck === 'unknown') {
      unknownReason ??= `parameter ${derivedParam.name} of ${baseMethod.name}() could not be resolved`;
    }
  }

  return unknownReason ? { status: 'unknown', reason: unknownReason } : SUBSTITUTABLE;
}

/**
 * Verdict for a derived class against its base. A definite violation in any
 * method wins over unknown results elsewhere.
 */
export function checkSubstitutability(symbols: SymbolTable, base: Declaration, derived: Declaration): Substitutability {
  const derivedMethods = methodsOf(derived);
  let unknown: Substitutability | undefined;

  for (const baseMethod of methodsOf(base)) {
    const verdict = checkMethod(symbols, baseMethod, derivedMethods);
    if (verdict.status === 'violating') return verdict;
    if (verdict.status === 'unknown') unknown ??= verdict;
  }

  return unknown ?? SUBSTITUTABLE;
}

// ---------------------------------------------------------------------------
// Checker
// ---------------------------------------------------------------------------

export const lspChecker: PrincipleChecker = {
  principle: 'LSP',
  name: 'Liskov Substitution Checker',
  check(declaration: Declaration, context: CheckContext): Evidence[] {
    if (declaration.kind !== 'class') return [];

    const base = findBaseClass(declaration, context.unit.declarations);
    if (!base) return [];

    const verdict = checkSubstitutability(context.unit.symbols, base, declaration);
    if (verdict.status !== 'violating') return [];

    return [evidenceFor(
      context.unit.filePath,
      declaration,
      `Not substitutable for ${base.name}: ${verdict.reason}`
    )];
  },
};
