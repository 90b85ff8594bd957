/**
 * Open/closed checker: a class should expose an extension point and
 * keep its state closed to outside modification.
 */

import type { Evidence, CheckContext, PrincipleChecker } from '../types.js';
import type { Declaration } from '../../../source/types.js';
import { fieldsOf, methodsOf, propertiesOf } from '../../../source/types.js';
import { evidenceFor } from '../store.js';

export function isOpenForExtension(declaration: Declaration): boolean {
  const methods = methodsOf(declaration);

  const hasInheritance = declaration.baseTypes.length > 0;
  const hasInterfaces = declaration.baseTypes.some((t) => t.form === 'named');
  const hasVirtualMethods = methods.some((m) => m.modifiers.has('virtual'));
  const hasAbstractMethods = methods.some((m) => m.modifiers.has('abstract'));
  const hasExtensionMethods = methods.some((m) => m.parameters[0]?.isReceiver === true);
  // A field typed by a bare name stands in for an injected strategy
  const usesStrategyPattern = fieldsOf(declaration).some((f) => f.type?.form === 'named');

  return hasInheritance
    || hasInterfaces
    || hasVirtualMethods
    || hasAbstractMethods
    || hasExtensionMethods
    || usesStrategyPattern;
}

/**
 * Both "every" checks hold vacuously for classes without properties or fields.
 */
export function isClosedForModification(declaration: Declaration): boolean {
  const fields = fieldsOf(declaration);

  const isSealed = declaration.modifiers.has('sealed');
  const hasPrivateSetters = propertiesOf(declaration).every((p) => p.setter === 'private');
  const hasReadonlyFields = fields.every((f) => f.modifiers.has('readonly'));
  const hasNoPublicMutableState = !fields.some(
    (f) => f.visibility === 'public' && !f.modifiers.has('readonly')
  );

  return (isSealed || hasPrivateSetters || hasReadonlyFields) && hasNoPublicMutableState;
}

export const ocpChecker: PrincipleChecker = {
  principle: 'OCP',
  name: 'Open/Closed Checker',
  check(declaration: Declaration, context: CheckContext): Evidence[] {
    if (declaration.kind !== 'class') return [];

    const open = isOpenForExtension(declaration);
    const closed = isClosedForModification(declaration);
    if (open && closed) return [];

    const reason = !open && !closed
      ? 'Class has no extension point and exposes mutable state'
      : !open
        ? 'Class has no extension point'
        : 'Class exposes mutable state';
    return [evidenceFor(context.unit.filePath, declaration, reason)];
  },
};
