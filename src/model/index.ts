export * from "./types.ts";
export * from "./result.ts";
export * from "./invariants.ts";
export * from "./validator.ts";
export * from "./traversal.ts";
export * from "./document.ts";
export * from "./merge.ts";
export * from "./projection.ts";
export {
  StructureEngine,
  type ChangeListener,
  type StructureEngineOptions,
} from "./engine.ts";
export { generateId } from "./schema.ts";
