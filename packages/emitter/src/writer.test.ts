/**
 * Tests for the artifact writer
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { strict as assert } from "assert";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { writeArtifact } from "./writer.js";

describe("writeArtifact", () => {
  let tmpDir = "";

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "monomap-writer-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should create missing directories", () => {
    const target = path.join(tmpDir, "gen", "maps", "intmap.ts");
    const result = writeArtifact(target, "export {};\n");

    assert.deepEqual(result, { ok: true, value: target });
    assert.equal(fs.readFileSync(target, "utf-8"), "export {};\n");
  });

  it("should overwrite an existing file", () => {
    const target = path.join(tmpDir, "intmap.ts");
    fs.writeFileSync(target, "old\n");

    assert.ok(writeArtifact(target, "new\n").ok);
    assert.equal(fs.readFileSync(target, "utf-8"), "new\n");
  });

  it("should report a path that cannot be written", () => {
    const blocker = path.join(tmpDir, "blocker");
    fs.writeFileSync(blocker, "");

    const result = writeArtifact(path.join(blocker, "intmap.ts"), "x");
    assert.ok(!result.ok);
    assert.equal(result.error.code, "MMP3002");
  });
});
