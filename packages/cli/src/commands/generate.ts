/**
 * monomap generate command - specialize the template and write the result
 */

import {
  loadTemplate,
  parseSource,
  resolveMappingType,
  type Diagnostic,
  type Result,
} from "@monomap/frontend";
import { specialize } from "@monomap/specializer";
import {
  emitSpecialization,
  type EmittedArtifact,
  type ImportNormalizer,
} from "@monomap/emitter";
import type { ResolvedConfig } from "../types.js";

const progress = (config: ResolvedConfig, message: string): void => {
  if (!config.quiet) {
    console.log(message);
  }
};

const step = (config: ResolvedConfig, message: string): void => {
  if (config.verbose && !config.quiet) {
    console.log(`  ${message}`);
  }
};

/**
 * Run the whole pipeline for one configuration. Nothing is written unless
 * every stage succeeds.
 */
export const generateCommand = (
  config: ResolvedConfig,
  normalizer?: ImportNormalizer
): Result<EmittedArtifact, Diagnostic> => {
  const mapping = resolveMappingType(config.literal);
  if (!mapping.ok) {
    return mapping;
  }
  step(
    config,
    `Key type: ${mapping.value.key.text}, value type: ${mapping.value.value.text}`
  );

  const source = loadTemplate(config.templatePath);
  if (!source.ok) {
    return source;
  }
  step(config, `Template: ${source.value.fileName}`);

  const template = parseSource(source.value.fileName, source.value.text);
  if (!template.ok) {
    return template;
  }

  const specialized = specialize(template.value, {
    key: mapping.value.key,
    value: mapping.value.value,
    name: config.name,
  });
  if (!specialized.ok) {
    return specialized;
  }
  step(config, `Specialized ${specialized.value.matched} declarations`);

  const emitted = emitSpecialization(specialized.value.sourceFile, {
    moduleName: config.moduleName,
    outPath: config.outPath,
    normalizer,
  });
  if (!emitted.ok) {
    return emitted;
  }
  step(config, `Output: ${emitted.value.path}`);

  progress(config, `✓ Generated ${config.name} (${config.literal})`);
  return emitted;
};
