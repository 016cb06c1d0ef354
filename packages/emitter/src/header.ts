/**
 * File header for generated specializations
 */

export const GENERATED_MARKER = "// Code generated by monomap; DO NOT EDIT.";

/**
 * Header placed above the specialized declarations, with a trailing newline
 */
export const generateFileHeader = (moduleName: string): string =>
  [GENERATED_MARKER, "", `/** @module ${moduleName} */`, ""].join("\n");
