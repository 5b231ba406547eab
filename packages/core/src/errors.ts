export type AssetliftErrorCode =
  | "AL_ERR_INVALID_INPUT"
  | "AL_ERR_NOT_FOUND"
  | "AL_ERR_FORMAT"
  | "AL_ERR_REFERENCE"
  | "AL_ERR_INTEGRITY_VIOLATION"
  | "AL_ERR_IO";

export class AssetliftError extends Error {
  readonly code: AssetliftErrorCode;

  constructor(code: AssetliftErrorCode, message: string) {
    super(message);
    this.name = "AssetliftError";
    this.code = code;
  }
}

export interface ErrorPayload {
  code: AssetliftErrorCode;
  message: string;
}

export function isAssetliftError(error: unknown): error is AssetliftError {
  return error instanceof AssetliftError;
}

export function asAssetliftError(
  error: unknown,
  fallbackCode: AssetliftErrorCode,
  fallbackMessage: string,
): AssetliftError {
  if (isAssetliftError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new AssetliftError(fallbackCode, `${fallbackMessage}: ${error.message}`);
  }
  return new AssetliftError(fallbackCode, fallbackMessage);
}

export function toErrorPayload(error: AssetliftError): ErrorPayload {
  return { code: error.code, message: error.message };
}
