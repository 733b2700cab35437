export * from "./apiError";
export * from "./apiResponse";
