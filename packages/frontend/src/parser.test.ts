/**
 * Tests for the syntax parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as ts from "typescript";
import { createSourceFile, getSyntaxErrors, parseSource } from "./parser.js";

describe("Syntax Parser", () => {
  describe("createSourceFile", () => {
    it("should set parent pointers", () => {
      const sourceFile = createSourceFile("a.ts", "const x: unknown = 1;");
      const [statement] = sourceFile.statements;
      expect(statement?.parent).to.equal(sourceFile);
    });
  });

  describe("getSyntaxErrors", () => {
    it("should report nothing for valid source", () => {
      const sourceFile = createSourceFile("a.ts", "function f(): void {}");
      expect(getSyntaxErrors(sourceFile)).to.have.length(0);
    });

    it("should report parser errors", () => {
      const sourceFile = createSourceFile("a.ts", "function f( {");
      expect(getSyntaxErrors(sourceFile).length).to.be.greaterThan(0);
    });

    it("should not report semantic errors", () => {
      const sourceFile = createSourceFile("a.ts", "const x: number = 'text';");
      expect(getSyntaxErrors(sourceFile)).to.have.length(0);
    });
  });

  describe("parseSource", () => {
    it("should return the parsed file", () => {
      const result = parseSource("template.ts", "export class A {}");
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.fileName).to.equal("template.ts");
        const [statement, ...rest] = result.value.statements;
        expect(rest).to.have.length(0);
        expect(
          statement !== undefined && ts.isClassDeclaration(statement)
        ).to.equal(true);
      }
    });

    it("should reject a template with syntax errors", () => {
      const result = parseSource("template.ts", "class A {\n  load( {\n}");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("MMP2006");
        expect(result.error.location?.file).to.equal("template.ts");
        expect(result.error.message).to.match(/^template does not parse: /);
      }
    });
  });
});
