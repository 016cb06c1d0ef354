/**
 * Layout pass.
 *
 * The printer lays tuple types and type literals out one member per line
 * unless they are flagged single-line. Tuples are always kept on one line;
 * type literals only when the template wrote them on one line.
 */

import * as ts from "typescript";

const isSingleLineInSource = (node: ts.Node): boolean => {
  const original = ts.getOriginalNode(node);
  if (!ts.isParseTreeNode(original) || original.pos < 0) {
    return false;
  }
  const sourceFile = original.getSourceFile();
  const start = sourceFile.getLineAndCharacterOfPosition(
    original.getStart(sourceFile)
  );
  const end = sourceFile.getLineAndCharacterOfPosition(original.end);
  return start.line === end.line;
};

export const createLayoutTransformer =
  (): ts.TransformerFactory<ts.SourceFile> => (context) => (sourceFile) => {
    const { factory } = context;

    // Synthesized nodes belong to this run and are flagged in place;
    // template nodes are copied first so the template keeps its flags.
    const singleLine = <T extends ts.Node>(
      node: T,
      copy: (node: T) => T
    ): T => {
      if (node.pos < 0) {
        return ts.setEmitFlags(node, ts.EmitFlags.SingleLine);
      }
      const copied = ts.setOriginalNode(
        ts.setTextRange(copy(node), node),
        node
      );
      return ts.setEmitFlags(copied, ts.EmitFlags.SingleLine);
    };

    const visit = (node: ts.Node): ts.Node => {
      const visited = ts.visitEachChild(node, visit, context);
      if (ts.isTupleTypeNode(visited)) {
        return singleLine(visited, (tuple) =>
          factory.createTupleTypeNode(tuple.elements)
        );
      }
      if (ts.isTypeLiteralNode(visited) && isSingleLineInSource(visited)) {
        return singleLine(visited, (literal) =>
          factory.createTypeLiteralNode(literal.members)
        );
      }
      return visited;
    };

    return ts.visitEachChild(sourceFile, visit, context);
  };
