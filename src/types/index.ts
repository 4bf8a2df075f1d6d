export * from "./accelerator.types";
export * from "./api.types";
export * from "./image.types";
export * from "./job.types";
export * from "./preset.types";
export * from "./sandbox.types";
export * from "./storage.types";
