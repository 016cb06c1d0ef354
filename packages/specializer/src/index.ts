/**
 * monomap specializer - rewrites the map template for concrete key and
 * value types
 */

export * from "./types.js";
export {
  hasPosition,
  positionAt,
  positionTree,
  synthesizeType,
} from "./positions.js";
export { SpecializationSession, isPlaceholder } from "./session.js";
export { updateSignature, describeFunction } from "./signature.js";
export { readSlot, splitSlot } from "./slots.js";
export { SENTINEL_NAME, acceptsSentinel, rewriteSentinel } from "./sentinel.js";
export {
  TEMPLATE_SYMBOLS,
  type SymbolRenameMap,
  buildRenameMap,
  checkRenameConflicts,
  createRenameTransformer,
  referencedNames,
  validateClassName,
} from "./renamer.js";
export {
  HandlerTable,
  DeclarationRegistry,
  type TakeResult,
  type PendingDeclaration,
} from "./registry.js";
export {
  ExhaustivenessValidator,
  type ExhaustivenessState,
} from "./validator.js";
export {
  type DispatchContext,
  dispatchStatement,
  dispatchDeclarations,
} from "./dispatcher.js";
export { createSyncMapRegistry } from "./handlers.js";
export { createLayoutTransformer } from "./layout.js";
export { specialize, type SpecializedTemplate } from "./specialize.js";
