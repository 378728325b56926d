export * from "./defaults.js";
export * from "./errors.js";
export type * from "./types.js";
export * from "./options.js";
export * from "./report.js";

export * from "./files/collect.js";
export * from "./files/text.js";
export * from "./files/write.js";

export * from "./labels/aggregate.js";
export * from "./labels/extract.js";
export * from "./labels/normalize.js";

export * from "./menu/emit.js";
export * from "./menu/paginate.js";

export * from "./screenplay/config.js";
export * from "./screenplay/emit.js";
export * from "./screenplay/escape.js";
export * from "./screenplay/names.js";
export * from "./screenplay/parse.js";
export * from "./screenplay/registry.js";
export * from "./screenplay/reserved.js";

export * from "./indexer.js";
export * from "./generator.js";
