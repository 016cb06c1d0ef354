/**
 * Exhaustiveness validator.
 *
 * pending -> consuming -> complete
 *         \            \
 *          +-> aborted  +-> aborted
 *
 * A run is complete only when the walk finished and every handler in the
 * registry was taken exactly once.
 */

import {
  createDiagnostic,
  ok,
  error,
  type Diagnostic,
  type Result,
} from "@monomap/frontend";
import type { DeclarationRegistry } from "./registry.js";

export type ExhaustivenessState = "pending" | "consuming" | "complete" | "aborted";

export class ExhaustivenessValidator {
  private current: ExhaustivenessState = "pending";
  private matchedCount = 0;

  constructor(private readonly registry: DeclarationRegistry) {}

  get state(): ExhaustivenessState {
    return this.current;
  }

  get matched(): number {
    return this.matchedCount;
  }

  private ensureOpen(operation: string): void {
    if (this.current === "complete" || this.current === "aborted") {
      throw new Error(`ICE: ${operation} after the run was ${this.current}`);
    }
  }

  /**
   * Record that a handler was taken and ran.
   */
  consumed(): void {
    this.ensureOpen("consumed");
    this.current = "consuming";
    this.matchedCount++;
  }

  /**
   * Abort the run with `diagnostic`, which is handed back for propagation.
   */
  abort(diagnostic: Diagnostic): Diagnostic {
    this.ensureOpen("abort");
    this.current = "aborted";
    return diagnostic;
  }

  /**
   * Close the run once the whole template has been walked.
   */
  finalize(): Result<number, Diagnostic> {
    this.ensureOpen("finalize");
    const [first, ...rest] = this.registry.remaining;
    if (first === undefined) {
      this.current = "complete";
      return ok(this.matchedCount);
    }
    return error(
      this.abort(
        createDiagnostic(
          "MMP2002",
          "error",
          `${first.category} declaration \`${first.name}\` was never matched`,
          undefined,
          rest.length > 0
            ? `Also never matched: ${rest.map((pending) => pending.name).join(", ")}`
            : undefined
        )
      )
    );
  }
}
