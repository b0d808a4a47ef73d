/**
 * Schema Module
 * Data model types, the port schema engine, ports and document parsing
 */

export * from "./types";
export * from "./port-schema";
export * from "./port";
export * from "./path";
export * from "./json";
export * from "./issues";
export * from "./json-schema";
export * from "./parser";
