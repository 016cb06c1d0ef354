/**
 * Tests for the type-expression resolver
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as ts from "typescript";
import { parseTypeExpression, resolveMappingType } from "./type-expression.js";

describe("Type-Expression Resolver", () => {
  describe("resolveMappingType", () => {
    it("should resolve key and value of a Map type", () => {
      const result = resolveMappingType("Map<string, number>");
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.key.text).to.equal("string");
        expect(result.value.value.text).to.equal("number");
        expect(result.value.key.node.kind).to.equal(ts.SyntaxKind.StringKeyword);
        expect(result.value.value.node.kind).to.equal(ts.SyntaxKind.NumberKeyword);
      }
    });

    it("should accept ReadonlyMap and Record", () => {
      const readonlyMap = resolveMappingType("ReadonlyMap<bigint, boolean>");
      const record = resolveMappingType("Record<string, Date>");
      expect(readonlyMap.ok && readonlyMap.value.value.text).to.equal("boolean");
      expect(record.ok && record.value.value.text).to.equal("Date");
    });

    it("should normalize whitespace", () => {
      const result = resolveMappingType("  Map< string ,   Array<  number >  > ");
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.key.text).to.equal("string");
        expect(result.value.value.text).to.equal("Array<number>");
      }
    });

    it("should parse each argument as its own expression", () => {
      const result = resolveMappingType("Map<string, string>");
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.key.node).to.not.equal(result.value.value.node);
        expect(result.value.key.node.getSourceFile()).to.not.equal(
          result.value.value.node.getSourceFile()
        );
      }
    });

    it("should keep composite value types", () => {
      const result = resolveMappingType(
        "Map<readonly string[], (a: number) => string | undefined>"
      );
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.key.text).to.equal("readonly string[]");
        expect(result.value.value.text).to.equal(
          "(a: number) => string | undefined"
        );
      }
    });

    it("should reject an empty literal", () => {
      const result = resolveMappingType("   ");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("MMP1001");
      }
    });

    it("should reject types that are not mappings", () => {
      for (const literal of ["string", "Set<string>", "Map<string>", "ns.Map<a, b>"]) {
        const result = resolveMappingType(literal);
        expect(result.ok, literal).to.equal(false);
        if (!result.ok) {
          expect(result.error.code, literal).to.equal("MMP1001");
        }
      }
    });

    it("should reject literals that do not parse", () => {
      const result = resolveMappingType("Map<string, >");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("MMP1002");
        expect(result.error.message).to.equal(
          "type literal `Map<string, >` does not parse as a type: type argument expected"
        );
      }
    });

    it("should reject a trailing comma after both type arguments", () => {
      const result = resolveMappingType("Map<string, number,>");
      expect(!result.ok && result.error.code).to.equal("MMP1002");
    });

    it("should reject function types with default or destructured parameters", () => {
      for (const literal of [
        "Map<string, (a = 1) => void>",
        "Map<string, ({ a }: { a: number }) => void>",
      ]) {
        const result = resolveMappingType(literal);
        expect(result.ok, literal).to.equal(false);
        if (!result.ok) {
          expect(result.error.code, literal).to.equal("MMP1003");
          expect(result.error.message, literal).to.include("(Parameter)");
        }
      }
    });

    it("should reject trailing statements", () => {
      const result = resolveMappingType("Map<string, number>; let x = 1");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("MMP1002");
        expect(result.error.message).to.include("single closed type expression");
      }
    });

    it("should reject type syntax that cannot be spliced", () => {
      const result = resolveMappingType("Map<string, <T>(x: T) => T>");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("MMP1003");
        expect(result.error.message).to.include("value type");
      }
    });
  });

  describe("parseTypeExpression", () => {
    it("should print the normalized text", () => {
      const result = parseTypeExpression("{ a : number ; }", "value type");
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(ts.isTypeLiteralNode(result.value.node)).to.equal(true);
        expect(result.value.text).to.equal("{\n    a: number;\n}");
      }
    });
  });
});
