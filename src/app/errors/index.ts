export * from "./handleCastError";
export * from "./handleDuplicateError";
export * from "./handleValidationError";
export * from "./handleZodError";
export * from "./handleStoreError";
