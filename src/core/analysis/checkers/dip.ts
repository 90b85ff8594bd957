/**
 * Dependency inversion checker.
 * A bare type name passes whether it names an interface or a concrete class.
 */

import type { Evidence, CheckContext, PrincipleChecker } from '../types.js';
import type { Declaration, TypeRef } from '../../../source/types.js';
import { fieldsOf, methodsOf, propertiesOf } from '../../../source/types.js';
import { evidenceFor } from '../store.js';

/**
 * Declared types of all fields, properties and method parameters.
 */
export function dependencyTypes(declaration: Declaration): TypeRef[] {
  const memberTypes = [...fieldsOf(declaration), ...propertiesOf(declaration)]
    .flatMap((m) => (m.type ? [m.type] : []));
  const parameterTypes = methodsOf(declaration)
    .flatMap((m) => m.parameters.map((p) => p.type));
  return [...memberTypes, ...parameterTypes];
}

function isAbstractionShaped(type: TypeRef): boolean {
  return type.form === 'primitive' || type.form === 'named';
}

export const dipChecker: PrincipleChecker = {
  principle: 'DIP',
  name: 'Dependency Inversion Checker',
  check(declaration: Declaration, context: CheckContext): Evidence[] {
    if (declaration.kind !== 'class') return [];

    const offending = dependencyTypes(declaration).filter((t) => !isAbstractionShaped(t));
    if (offending.length === 0) return [];

    const texts = [...new Set(offending.map((t) => t.text))];
    return [evidenceFor(
      context.unit.filePath,
      declaration,
      `Class depends on non-abstract types: ${texts.join(', ')}`
    )];
  },
};
