/**
 * Declaration registry - the handler tables the dispatcher draws from.
 *
 * Each handler can be taken once. Whatever is still pending when the walk
 * ends marks a declaration the template no longer has.
 */

import type * as ts from "typescript";
import type {
  DeclarationCategory,
  DeclarationHandler,
  FunctionLikeDeclaration,
  TypeDeclaration,
  ValueDeclaration,
} from "./types.js";

export type TakeResult<T extends ts.Node> =
  | { readonly kind: "matched"; readonly handler: DeclarationHandler<T> }
  | { readonly kind: "duplicate" }
  | { readonly kind: "unrecognized" };

export type PendingDeclaration = {
  readonly category: DeclarationCategory;
  readonly name: string;
};

export class HandlerTable<T extends ts.Node> {
  private readonly pending: Map<string, DeclarationHandler<T>>;
  private readonly taken = new Set<string>();

  constructor(
    readonly category: DeclarationCategory,
    handlers: Readonly<Record<string, DeclarationHandler<T>>>
  ) {
    this.pending = new Map(Object.entries(handlers));
  }

  /**
   * Move the handler for `name` out of the table.
   */
  take(name: string): TakeResult<T> {
    const handler = this.pending.get(name);
    if (handler !== undefined) {
      this.pending.delete(name);
      this.taken.add(name);
      return { kind: "matched", handler };
    }
    return this.taken.has(name)
      ? { kind: "duplicate" }
      : { kind: "unrecognized" };
  }

  get size(): number {
    return this.pending.size;
  }

  get remaining(): readonly PendingDeclaration[] {
    return [...this.pending.keys()].map((name) => ({
      category: this.category,
      name,
    }));
  }
}

export class DeclarationRegistry {
  constructor(
    readonly functions: HandlerTable<FunctionLikeDeclaration>,
    readonly types: HandlerTable<TypeDeclaration>,
    readonly values: HandlerTable<ValueDeclaration>
  ) {}

  get size(): number {
    return this.functions.size + this.types.size + this.values.size;
  }

  /**
   * Declarations whose handlers were never taken, types first.
   */
  get remaining(): readonly PendingDeclaration[] {
    return [
      ...this.types.remaining,
      ...this.functions.remaining,
      ...this.values.remaining,
    ];
  }
}
