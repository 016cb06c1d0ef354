/**
 * Tests for the specialization printer
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as ts from "typescript";
import { createSourceFile } from "@monomap/frontend";
import { positionAt } from "@monomap/specializer";
import { GENERATED_MARKER, generateFileHeader } from "./header.js";
import { findUnpositioned, printSpecialization } from "./printer.js";

const withStatement = (statement: ts.Statement): ts.SourceFile => {
  const sourceFile = createSourceFile("printer-input.ts", "const a = 1;\n");
  return ts.factory.updateSourceFile(sourceFile, [
    ...sourceFile.statements,
    statement,
  ]);
};

describe("Printer", () => {
  it("should build the generated-file header", () => {
    expect(generateFileHeader("main")).to.equal(
      `${GENERATED_MARKER}\n\n/** @module main */\n`
    );
  });

  it("should print positioned trees below the header", () => {
    const parsed = createSourceFile("printer-input.ts", "const a = 1;\n");
    const anchor = parsed.statements[0];
    if (anchor === undefined) {
      throw new Error("no statement");
    }
    const sourceFile = ts.factory.updateSourceFile(parsed, [
      ...parsed.statements,
      positionAt(ts.factory.createEmptyStatement(), anchor),
    ]);

    const result = printSpecialization(sourceFile, { moduleName: "cache" });
    expect(result).to.deep.equal({
      ok: true,
      value: `${generateFileHeader("cache")}\nconst a = 1;\n;\n`,
    });
  });

  it("should refuse a node without a position", () => {
    const statement = ts.factory.createEmptyStatement();
    const sourceFile = withStatement(statement);
    expect(findUnpositioned(sourceFile)).to.equal(statement);

    const result = printSpecialization(sourceFile, { moduleName: "main" });
    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.code).to.equal("MMP4002");
      expect(result.error.message).to.equal(
        "EmptyStatement node reached the printer without a position"
      );
    }
  });

  it("should find nothing in a parsed file", () => {
    const sourceFile = createSourceFile(
      "printer-input.ts",
      "export function f(x: number): [n: number, ok: boolean] {\n    return [x, true];\n}\n"
    );
    expect(findUnpositioned(sourceFile)).to.equal(undefined);
  });
});
