import status from "http-status";

export enum ErrorCode {
  NOT_FOUND = "NOT_FOUND",
  INVALID_STATUS = "INVALID_STATUS",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  FORBIDDEN = "FORBIDDEN",
  CONFLICT = "CONFLICT",
  STORE_UNAVAILABLE = "STORE_UNAVAILABLE",
  TOO_MANY_REQUESTS = "TOO_MANY_REQUESTS",
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

const codeForStatus = (statusCode: number): ErrorCode => {
  switch (statusCode) {
    case status.NOT_FOUND:
      return ErrorCode.NOT_FOUND;
    case status.BAD_REQUEST:
      return ErrorCode.VALIDATION_ERROR;
    case status.UNAUTHORIZED:
    case status.FORBIDDEN:
      return ErrorCode.FORBIDDEN;
    case status.CONFLICT:
      return ErrorCode.CONFLICT;
    case status.UNPROCESSABLE_ENTITY:
      return ErrorCode.INVALID_STATUS;
    case status.SERVICE_UNAVAILABLE:
      return ErrorCode.STORE_UNAVAILABLE;
    case status.TOO_MANY_REQUESTS:
      return ErrorCode.TOO_MANY_REQUESTS;
    default:
      return ErrorCode.INTERNAL_ERROR;
  }
};

export class ApiError extends Error {
  statusCode: number;
  code: ErrorCode;
  context: string;
  constructor(statusCode: number, message = "", context = "Global", code?: ErrorCode) {
    super(message);
    this.name = "ApiError";
    this.statusCode = statusCode;
    this.code = code ?? codeForStatus(statusCode);
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }
}

export const getApiErrorClass = function (context: string) {
  return class extends ApiError {
    constructor(statusCode: number, message = "", code?: ErrorCode) {
      super(statusCode, message, context, code);
    }
  };
}
