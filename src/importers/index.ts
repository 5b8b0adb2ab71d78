export * from "./script-parser.ts";
export * from "./shelf-importer.ts";
export * from "./legacy-config.ts";
