/**
 * Typed failures raised by the delivery core, the input handler, the
 * configuration loader and the vendor client. Tool handlers turn every one of
 * them into an `isError` tool result (see buildErrorResult in helpers.ts).
 */

export type ErrorCode =
  | "InvalidPath"
  | "IOFailure"
  | "FileNotFound"
  | "UnsupportedContent"
  | "PathEscape"
  | "NotFound"
  | "InvalidConfiguration"
  | "InvalidArgument"
  | "VendorError"
  | "UnexpectedResponse";

export class ElevenLabsMcpError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ElevenLabsMcpError";
    this.code = code;
  }
}

export class VendorError extends ElevenLabsMcpError {
  readonly status: number;

  constructor(status: number, message: string, options?: { cause?: unknown }) {
    super("VendorError", message, options);
    this.name = "VendorError";
    this.status = status;
  }
}

export function isErrorWithCode(err: unknown, code: ErrorCode): err is ElevenLabsMcpError {
  return err instanceof ElevenLabsMcpError && err.code === code;
}

export function invalidArgument(message: string): ElevenLabsMcpError {
  return new ElevenLabsMcpError("InvalidArgument", message);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errnoCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}
