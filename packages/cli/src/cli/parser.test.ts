/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse help command from --help", () => {
        expect(parseArgs(["--help"])).to.deep.equal({ command: "help" });
      });

      it("should parse help command from -h", () => {
        expect(parseArgs(["Map<string, number>", "-h"]).command).to.equal(
          "help"
        );
      });

      it("should parse version command from --version", () => {
        expect(parseArgs(["--version"])).to.deep.equal({ command: "version" });
      });

      it("should parse version command from -v", () => {
        expect(parseArgs(["-v"]).command).to.equal("version");
      });

      it("should generate when given a type literal", () => {
        expect(parseArgs(["Map<string, number>"])).to.deep.equal({
          command: "generate",
          literal: "Map<string, number>",
          options: {},
        });
      });
    });

    describe("Type literal", () => {
      it("should take the last positional argument", () => {
        const result = parseArgs([
          "Map<string, string>",
          "-q",
          "Map<string, number>",
        ]);
        expect(result.command === "generate" && result.literal).to.equal(
          "Map<string, number>"
        );
      });

      it("should report a missing type literal", () => {
        expect(parseArgs(["-q"])).to.deep.equal({
          command: "usage",
          message: "missing type literal, such as Map<string, number>",
        });
      });

      it("should report a missing type literal for no arguments", () => {
        expect(parseArgs([]).command).to.equal("usage");
      });
    });

    describe("Options", () => {
      it("should parse long options", () => {
        const result = parseArgs([
          "--out",
          "gen/intmap.ts",
          "--module",
          "maps",
          "--name",
          "IntMap",
          "--template",
          "map.ts",
          "--verbose",
          "--quiet",
          "Map<string, number>",
        ]);
        expect(result).to.deep.equal({
          command: "generate",
          literal: "Map<string, number>",
          options: {
            out: "gen/intmap.ts",
            module: "maps",
            name: "IntMap",
            template: "map.ts",
            verbose: true,
            quiet: true,
          },
        });
      });

      it("should parse short options", () => {
        const result = parseArgs([
          "Map<string, number>",
          "-o",
          "out.ts",
          "-m",
          "maps",
          "-n",
          "IntMap",
          "-t",
          "map.ts",
          "-V",
          "-q",
        ]);
        expect(result.command === "generate" && result.options).to.deep.equal({
          out: "out.ts",
          module: "maps",
          name: "IntMap",
          template: "map.ts",
          verbose: true,
          quiet: true,
        });
      });

      it("should not take an option value as the type literal", () => {
        const result = parseArgs(["Map<string, number>", "-n", "IntMap"]);
        expect(result.command === "generate" && result.literal).to.equal(
          "Map<string, number>"
        );
      });
    });

    describe("Usage errors", () => {
      it("should reject unknown options", () => {
        expect(parseArgs(["--frobnicate", "Map<string, number>"])).to.deep.equal(
          { command: "usage", message: "unknown option --frobnicate" }
        );
      });

      it("should reject an option without its value", () => {
        expect(parseArgs(["Map<string, number>", "--out"])).to.deep.equal({
          command: "usage",
          message: "option --out requires a value",
        });
      });
    });
  });
});
