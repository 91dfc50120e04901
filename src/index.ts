export * from "./logger";
export * from "./errors";
export * from "./health";
export * from "./limits";
export * from "./owner";
export * from "./id_handle";
export * from "./enum_store";
export * from "./id_registry";
export * from "./create_registry";
