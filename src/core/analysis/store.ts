/**
 * Violation aggregation: one Violation per principle per run,
 * evidence appended in the order checkers visit declarations.
 */

import type { Declaration } from '../../source/types.js';
import type { Evidence, Principle, Violation } from './types.js';
import { AnalysisError, ErrorCodes } from '../../utils/errors.js';

// ---------------------------------------------------------------------------
// Record factories
// ---------------------------------------------------------------------------

export function createEvidence(fields: Evidence): Evidence {
  return Object.freeze({ ...fields });
}

/**
 * Evidence for a flagged declaration: its start line and full source text.
 */
export function evidenceFor(file: string, declaration: Declaration, reason: string): Evidence {
  return createEvidence({
    file,
    line: declaration.location.line,
    snippet: declaration.text,
    subject: declaration.name,
    reason,
  });
}

export function createViolation(
  principle: Principle,
  evidences: readonly Evidence[] = [],
  explanation?: string,
): Violation {
  const violation: Violation = explanation === undefined
    ? { principle, evidences: Object.freeze([...evidences]) }
    : { principle, evidences: Object.freeze([...evidences]), explanation };
  return Object.freeze(violation);
}

/**
 * New Violation with the explanation set; the input is left untouched.
 */
export function withExplanation(violation: Violation, explanation: string): Violation {
  return createViolation(violation.principle, violation.evidences, explanation);
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

/**
 * Opaque reference to a principle's record inside one store.
 */
export class ViolationHandle {
  constructor(readonly principle: Principle) {}
}

interface Entry {
  handle: ViolationHandle;
  evidences: Evidence[];
}

export class ViolationStore {
  // Map iteration order is insertion order, which is first-detection order
  private entries = new Map<Principle, Entry>();
  private handles = new Set<ViolationHandle>();

  /**
   * Handle for the principle's record, creating the record on first use.
   */
  getOrCreate(principle: Principle): ViolationHandle {
    const existing = this.entries.get(principle);
    if (existing) return existing.handle;

    const handle = new ViolationHandle(principle);
    this.entries.set(principle, { handle, evidences: [] });
    this.handles.add(handle);
    return handle;
  }

  append(handle: ViolationHandle, evidence: Evidence): void {
    const entry = this.handles.has(handle) ? this.entries.get(handle.principle) : undefined;
    if (!entry) {
      throw new AnalysisError(
        ErrorCodes.UNKNOWN_HANDLE,
        `Violation handle for ${handle.principle} does not belong to this store`,
        { principle: handle.principle }
      );
    }
    entry.evidences.push(evidence);
  }

  has(principle: Principle): boolean {
    return this.entries.has(principle);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Frozen snapshots in first-detection order.
   */
  toViolations(): Violation[] {
    return [...this.entries.entries()].map(([principle, entry]) =>
      createViolation(principle, entry.evidences)
    );
  }
}
