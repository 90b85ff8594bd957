/**
 * Interface segregation checker: flags interfaces that are too wide
 * or whose methods span too many concerns.
 */

import type { Evidence, CheckContext, PrincipleChecker } from '../types.js';
import type { Declaration } from '../../../source/types.js';
import { eventsOf, methodsOf, propertiesOf } from '../../../source/types.js';
import { evidenceFor } from '../store.js';

export type MethodCategory = 'Accessor' | 'Calculation' | 'Persistence' | 'Validation' | 'Other';

/** Case-insensitive name prefixes, evaluated top to bottom. */
const PREFIX_RULES: ReadonlyArray<{ prefixes: readonly string[]; label: MethodCategory }> = [
  { prefixes: ['get', 'set', 'is'], label: 'Accessor' },
  { prefixes: ['calculate', 'compute'], label: 'Calculation' },
  { prefixes: ['save', 'load', 'delete'], label: 'Persistence' },
  { prefixes: ['validate', 'check'], label: 'Validation' },
];

export function categorizeByPrefix(methodName: string): MethodCategory {
  const name = methodName.toLowerCase();
  const rule = PREFIX_RULES.find((r) => r.prefixes.some((p) => name.startsWith(p)));
  return rule ? rule.label : 'Other';
}

export const ispChecker: PrincipleChecker = {
  principle: 'ISP',
  name: 'Interface Segregation Checker',
  check(declaration: Declaration, context: CheckContext): Evidence[] {
    if (declaration.kind !== 'interface') return [];

    const { max_members, max_categories } = context.heuristics.isp;
    const methods = methodsOf(declaration);
    const total = methods.length + propertiesOf(declaration).length + eventsOf(declaration).length;
    const categories = new Set(methods.map((m) => categorizeByPrefix(m.name)));

    const reasons: string[] = [];
    if (total > max_members) {
      reasons.push(`declares ${total} members (max ${max_members})`);
    }
    if (categories.size > max_categories) {
      reasons.push(`spans ${categories.size} method categories (${[...categories].join(', ')})`);
    }

    if (reasons.length === 0) return [];
    return [evidenceFor(context.unit.filePath, declaration, `Interface ${reasons.join('; ')}`)];
  },
};
