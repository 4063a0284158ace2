import { UploadValidationError } from "./errors";
import type { SupportedMimeType, UploadCandidate } from "../types";

export const UPLOAD_ACCEPT = ".pdf,.jpg,.jpeg,.png,application/pdf,image/jpeg,image/png";

const MIME_ALIASES: Record<string, SupportedMimeType> = {
  "application/pdf": "application/pdf",
  "image/jpeg": "image/jpeg",
  "image/jpg": "image/jpeg",
  "image/pjpeg": "image/jpeg",
  "image/png": "image/png",
};

const EXTENSION_TYPES: Record<string, SupportedMimeType> = {
  pdf: "application/pdf",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
};

function extensionOf(fileName: string): string {
  const dot = fileName.lastIndexOf(".");
  return dot < 0 ? "" : fileName.slice(dot + 1).toLowerCase();
}

/**
 * Maps a declared MIME type onto one of the supported upload types. Browsers
 * leave the type empty for some files, so the extension decides in that case.
 */
export function resolveUploadMimeType(
  fileName: string,
  declaredType: string,
): SupportedMimeType | null {
  const normalized = declaredType.trim().toLowerCase();
  if (normalized && normalized !== "application/octet-stream") {
    return MIME_ALIASES[normalized] ?? null;
  }
  return EXTENSION_TYPES[extensionOf(fileName)] ?? null;
}

export function validateUpload(candidate: UploadCandidate): SupportedMimeType {
  const mimeType = resolveUploadMimeType(candidate.name, candidate.type);
  if (!mimeType) {
    throw new UploadValidationError(candidate.name, candidate.type);
  }
  return mimeType;
}

export async function readUploadCandidate(file: File): Promise<UploadCandidate> {
  return {
    name: file.name,
    type: file.type,
    size: file.size,
    bytes: new Uint8Array(await file.arrayBuffer()),
  };
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
