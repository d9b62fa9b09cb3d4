export * from "./core";
export * from "./errors";
export * from "./config";
export * from "./metrics";
export * from "./simulation";
export * from "./curves";
export * from "./physics";
export * from "./ticker";
export * from "./schedulers";
export * from "./activity";
export * from "./drag";
export * from "./notifications";
export * from "./position";
export * from "./nested";
export * from "./dom";
export * from "./middleware/compose";
export * from "./middleware/storagePersistence";
