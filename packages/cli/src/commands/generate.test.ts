/**
 * Tests for the generate command
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import {
  existsSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createDiagnostic, error } from "@monomap/frontend";
import type { ResolvedConfig } from "../types.js";
import { generateCommand } from "./generate.js";

describe("generateCommand", () => {
  let workDir = "";

  const configFor = (overrides: Partial<ResolvedConfig>): ResolvedConfig => ({
    literal: "Map<string, number>",
    name: "IntMap",
    moduleName: "main",
    outPath: join(workDir, "intmap.ts"),
    verbose: false,
    quiet: true,
    ...overrides,
  });

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), "monomap-generate-"));
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  it("should write the specialization", () => {
    const result = generateCommand(configFor({}));

    expect(result.ok).to.equal(true);
    const text = readFileSync(join(workDir, "intmap.ts"), "utf-8");
    expect(text).to.include("/** @module main */");
    expect(text).to.include("export class IntMap {");
    expect(text).to.include("store(key: string, value: number): void {");
  });

  it("should stop at an invalid type literal and write nothing", () => {
    const result = generateCommand(configFor({ literal: "Set<string>" }));

    expect(!result.ok && result.error.code).to.equal("MMP1001");
    expect(existsSync(join(workDir, "intmap.ts"))).to.equal(false);
  });

  it("should report a missing template", () => {
    const result = generateCommand(
      configFor({ templatePath: join(workDir, "missing.ts") })
    );
    expect(!result.ok && result.error.code).to.equal("MMP3001");
  });

  it("should fail on a template with an extra declaration", () => {
    const templatePath = join(workDir, "extra.ts");
    writeFileSync(templatePath, "export function surprise(): void {}\n");

    const result = generateCommand(configFor({ templatePath }));

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.code).to.equal("MMP2001");
      expect(result.error.message).to.equal(
        "unrecognized function declaration `surprise`"
      );
    }
    expect(existsSync(join(workDir, "intmap.ts"))).to.equal(false);
  });

  it("should fail on a template with syntax errors", () => {
    const templatePath = join(workDir, "broken.ts");
    writeFileSync(templatePath, "export class {\n");

    const result = generateCommand(configFor({ templatePath }));
    expect(!result.ok && result.error.code).to.equal("MMP2006");
  });

  it("should write nothing when the normalizer fails", () => {
    const result = generateCommand(configFor({}), () =>
      error(createDiagnostic("MMP4001", "error", "normalizer failed"))
    );

    expect(!result.ok && result.error.code).to.equal("MMP4001");
    expect(existsSync(join(workDir, "intmap.ts"))).to.equal(false);
  });
});
