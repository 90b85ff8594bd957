/**
 * Single responsibility checker: partitions a class's methods into
 * responsibility categories and flags classes that mix them or grow too large.
 */

import type { Evidence, CheckContext, PrincipleChecker } from '../types.js';
import type { Declaration, Member } from '../../../source/types.js';
import { methodsOf, propertiesOf } from '../../../source/types.js';
import { evidenceFor } from '../store.js';

// ---------------------------------------------------------------------------
// Responsibility rules
// ---------------------------------------------------------------------------

export type Responsibility =
  | 'Calculation'
  | 'DataAccess'
  | 'Validation'
  | 'Formatting'
  | 'Logging'
  | 'Other'
  | 'DataManagement';

interface ResponsibilityRule {
  matches(method: Member, loggingReceivers: readonly string[]): boolean;
  label: Responsibility;
}

function nameContains(...fragments: string[]) {
  return (method: Member): boolean => {
    const name = method.name.toLowerCase();
    return fragments.some((f) => name.includes(f));
  };
}

/** Evaluated top to bottom; first match wins. */
const RESPONSIBILITY_RULES: readonly ResponsibilityRule[] = [
  { matches: nameContains('calculate', 'compute'), label: 'Calculation' },
  { matches: nameContains('save', 'load', 'fetch'), label: 'DataAccess' },
  { matches: nameContains('validate', 'check'), label: 'Validation' },
  { matches: nameContains('format', 'parse'), label: 'Formatting' },
  {
    matches: (method, receivers) => [...method.bodyMarkers].some((m) => isLoggingCall(m, receivers)),
    label: 'Logging',
  },
];

/**
 * A call like `console.log(...)` or `this.logger.warn(...)`: the receiver root,
 * after an optional `this.`, is a logging receiver and a member is accessed on it.
 */
export function isLoggingCall(callee: string, receivers: readonly string[]): boolean {
  const path = callee.startsWith('this.') ? callee.slice('this.'.length) : callee;
  const dot = path.indexOf('.');
  if (dot <= 0 || dot === path.length - 1) return false;
  return receivers.includes(path.slice(0, dot));
}

export function categorizeMethod(method: Member, loggingReceivers: readonly string[]): Responsibility {
  const rule = RESPONSIBILITY_RULES.find((r) => r.matches(method, loggingReceivers));
  return rule ? rule.label : 'Other';
}

/**
 * Distinct responsibilities of a class, in first-seen order.
 */
export function analyzeResponsibilities(
  declaration: Declaration,
  loggingReceivers: readonly string[],
): Responsibility[] {
  const categories = new Set<Responsibility>(
    methodsOf(declaration).map((m) => categorizeMethod(m, loggingReceivers))
  );

  if (propertiesOf(declaration).some((p) => p.visibility === 'public')) {
    categories.add('DataManagement');
  }

  return [...categories];
}

// ---------------------------------------------------------------------------
// Checker
// ---------------------------------------------------------------------------

export const srpChecker: PrincipleChecker = {
  principle: 'SRP',
  name: 'Single Responsibility Checker',
  check(declaration: Declaration, context: CheckContext): Evidence[] {
    if (declaration.kind !== 'class') return [];

    const { max_methods, max_properties, logging_receivers } = context.heuristics.srp;
    const responsibilities = analyzeResponsibilities(declaration, logging_receivers);
    const methodCount = methodsOf(declaration).length;
    const propertyCount = propertiesOf(declaration).length;

    const reasons: string[] = [];
    if (responsibilities.length > 1) {
      reasons.push(`mixes ${responsibilities.length} responsibilities (${responsibilities.join(', ')})`);
    }
    if (methodCount > max_methods) {
      reasons.push(`has ${methodCount} methods (max ${max_methods})`);
    }
    if (propertyCount > max_properties) {
      reasons.push(`has ${propertyCount} properties (max ${max_properties})`);
    }

    if (reasons.length === 0) return [];
    return [evidenceFor(context.unit.filePath, declaration, `Class ${reasons.join('; ')}`)];
  },
};
