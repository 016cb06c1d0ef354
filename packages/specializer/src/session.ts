/**
 * Specialization session - the state shared by every declaration handler
 * during one run over the template.
 */

import * as ts from "typescript";
import type { TypeExpression } from "@monomap/frontend";
import { synthesizeType } from "./positions.js";
import type { SpecializationTarget, ValueRole } from "./types.js";

/**
 * Template placeholders are the `unknown` keyword type.
 */
export const isPlaceholder = (node: ts.Node): boolean =>
  node.kind === ts.SyntaxKind.UnknownKeyword;

export class SpecializationSession {
  readonly factory: ts.NodeFactory;
  private readonly splices = new WeakMap<ts.Node, ValueRole>();

  constructor(
    private readonly context: ts.TransformationContext,
    readonly target: SpecializationTarget
  ) {
    this.factory = context.factory;
  }

  /**
   * True when key and value print the same, in which case a shared
   * key/value slot keeps its single-slot form.
   */
  get keysMatchValues(): boolean {
    return this.target.key.text === this.target.value.text;
  }

  typeFor(role: ValueRole): TypeExpression {
    return role === "key" ? this.target.key : this.target.value;
  }

  /**
   * A fresh copy of the key or value type, positioned at `anchor`.
   */
  splice(role: ValueRole, anchor: ts.Node): ts.TypeNode {
    const spliced = synthesizeType(
      this.factory,
      this.typeFor(role).node,
      anchor
    );
    this.splices.set(spliced, role);
    return spliced;
  }

  /**
   * Role of a spliced type root, or undefined for template nodes.
   */
  roleOf(node: ts.Node): ValueRole | undefined {
    return this.splices.get(node);
  }

  isSpliced(node: ts.Node): boolean {
    return this.splices.has(node);
  }

  /**
   * Replace every placeholder strictly below `node`. Types spliced
   * earlier in the session are left alone.
   */
  substitute<T extends ts.Node>(node: T, role: ValueRole): T {
    const visit = (child: ts.Node): ts.Node => {
      if (this.isSpliced(child)) {
        return child;
      }
      if (isPlaceholder(child)) {
        return this.splice(role, child);
      }
      return ts.visitEachChild(child, visit, this.context);
    };
    return ts.visitEachChild(node, visit, this.context);
  }

  /**
   * Like `substitute`, but also replaces `node` itself when it is a
   * placeholder.
   */
  substituteType(node: ts.TypeNode, role: ValueRole): ts.TypeNode {
    if (this.isSpliced(node)) {
      return node;
    }
    return isPlaceholder(node)
      ? this.splice(role, node)
      : this.substitute(node, role);
  }

  substituteKey<T extends ts.Node>(node: T): T {
    return this.substitute(node, "key");
  }

  substituteValue<T extends ts.Node>(node: T): T {
    return this.substitute(node, "value");
  }

  visitChildren<T extends ts.Node>(node: T, visitor: ts.Visitor): T {
    return ts.visitEachChild(node, visitor, this.context);
  }
}
