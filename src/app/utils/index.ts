export * from "./asyncHandler";
export * from "./cookieUtils";
export * from "./escapeRegex";
export * from "./generateToken";
export * from "./parseWith";
export * from "./password";
export * from "./passwordReset";
export * from "./sendEmail";
