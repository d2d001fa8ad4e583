export * from "./ids.js";
export * from "./properties.js";
export * from "./object.js";
export * from "./native.js";
export * from "./session.js";
export * from "./logger.js";
export * from "./dependency-sorter.js";
export * from "./registry.js";
export * from "./component-finder.js";
export * from "./locks.js";
export * from "./serializer.js";
export * from "./hierarchy.js";
export * from "./template-revisions.js";
export * from "./dispatcher.js";
export * from "./translators/base.js";
export * from "./translators/property-translator.js";
export * from "./translators/component-translator.js";
export * from "./translators/node-translator.js";
export * from "./translators/scene-translator.js";
export * from "./translators/asset-path-translator.js";
export * from "./replicator.js";
export * from "./memory-engine.js";
