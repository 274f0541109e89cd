export type ErrorCode =
  | "invalid_request"
  | "unauthorized"
  | "not_found"
  | "length_mismatch"
  | "out_of_range"
  | "capacity_exceeded"
  | "internal_error";

export type ErrorResponse = {
  error: ErrorCode;
  message: string;
  details?: string;
};

type IdentityErrorShape = { code: ErrorCode; message: string; details?: string };

export class IdentityError extends Error implements IdentityErrorShape {
  code: ErrorCode;
  details?: string;
  constructor(input: IdentityErrorShape) {
    super(input.message);
    this.name = "IdentityError";
    this.code = input.code;
    if (input.details) {
      this.details = input.details;
    }
  }
}

export const fail = (code: ErrorCode, message: string, details?: string): never => {
  throw new IdentityError({ code, message, details });
};

export const isIdentityError = (error: unknown, code?: ErrorCode): error is IdentityError =>
  error instanceof IdentityError && (code === undefined || error.code === code);

export const makeErrorResponse = (error: unknown): ErrorResponse => {
  if (error instanceof IdentityError) {
    const response: ErrorResponse = { error: error.code, message: error.message };
    if (error.details) {
      response.details = error.details;
    }
    return response;
  }
  return {
    error: "internal_error",
    message: error instanceof Error ? error.message : String(error)
  };
};
