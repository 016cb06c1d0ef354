/**
 * monomap emitter - prints, normalizes and writes specializations
 */

export { GENERATED_MARKER, generateFileHeader } from "./header.js";
export {
  type PrintOptions,
  findUnpositioned,
  printSpecialization,
} from "./printer.js";
export {
  type ImportNormalizer,
  applyTextChanges,
  normalizeImports,
} from "./imports.js";
export { writeArtifact } from "./writer.js";
export {
  type EmitOptions,
  type EmittedArtifact,
  emitSpecialization,
} from "./emit.js";
