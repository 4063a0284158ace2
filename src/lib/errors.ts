export class UploadValidationError extends Error {
  fileName: string;
  mimeType: string;

  constructor(fileName: string, mimeType: string) {
    super(
      `${fileName}: unsupported file type "${mimeType || "unknown"}". Upload a PDF, JPEG or PNG file.`,
    );
    this.name = "UploadValidationError";
    this.fileName = fileName;
    this.mimeType = mimeType;
  }
}

export class ConversionError extends Error {
  fileName: string;

  constructor(fileName: string, message: string) {
    super(`${fileName}: ${message}`);
    this.name = "ConversionError";
    this.fileName = fileName;
  }
}

export type ExtractionFailureReason =
  | "config"
  | "network"
  | "auth"
  | "http"
  | "response";

export class ExtractionError extends Error {
  reason: ExtractionFailureReason;
  imageLabel: string;

  constructor(
    reason: ExtractionFailureReason,
    imageLabel: string,
    message: string,
  ) {
    super(`${imageLabel}: ${message}`);
    this.name = "ExtractionError";
    this.reason = reason;
    this.imageLabel = imageLabel;
  }
}

export class EditCoercionError extends Error {
  field: string;
  value: string;

  constructor(field: string, value: string, message: string) {
    super(message);
    this.name = "EditCoercionError";
    this.field = field;
    this.value = value;
  }
}

export function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}
