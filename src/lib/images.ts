import { ConversionError } from "./errors";
import { createId } from "./log";
import type { RenderedImage, UploadedFile } from "../types";

const JPEG_MAGIC = [0xff, 0xd8, 0xff];
const PNG_MAGIC = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

function startsWith(bytes: Uint8Array, prefix: number[]): boolean {
  if (bytes.length < prefix.length) return false;
  return prefix.every((value, index) => bytes[index] === value);
}

export function sniffImageType(
  bytes: Uint8Array,
): "image/jpeg" | "image/png" | null {
  if (startsWith(bytes, JPEG_MAGIC)) return "image/jpeg";
  if (startsWith(bytes, PNG_MAGIC)) return "image/png";
  return null;
}

export function bytesToBase64(bytes: Uint8Array): string {
  let binary = "";
  const chunkSize = 0x8000;
  for (let offset = 0; offset < bytes.length; offset += chunkSize) {
    binary += String.fromCharCode(...bytes.subarray(offset, offset + chunkSize));
  }
  return btoa(binary);
}

export function toDataUrl(mimeType: string, bytes: Uint8Array): string {
  return `data:${mimeType};base64,${bytesToBase64(bytes)}`;
}

export function imageLabel(image: RenderedImage): string {
  return image.totalPages > 1
    ? `${image.sourceName} (page ${image.pageNumber}/${image.totalPages})`
    : image.sourceName;
}

/**
 * Native images go to the model as uploaded. The bytes are only checked
 * against the declared type so a renamed file fails here rather than at the
 * endpoint.
 */
export function renderNativeImage(upload: UploadedFile): RenderedImage {
  const detected = sniffImageType(upload.bytes);
  if (!detected) {
    throw new ConversionError(upload.name, "file is not a readable JPEG or PNG image.");
  }
  if (detected !== upload.mimeType) {
    throw new ConversionError(
      upload.name,
      `file content is ${detected} but was uploaded as ${upload.mimeType}.`,
    );
  }

  return {
    id: createId(),
    uploadId: upload.id,
    sourceName: upload.name,
    pageNumber: 1,
    totalPages: 1,
    mimeType: detected,
    dataUrl: toDataUrl(detected, upload.bytes),
  };
}
