import { describe, expect, it } from "vitest";
import { ConversionError } from "./errors";
import { bytesToBase64, imageLabel, renderNativeImage, sniffImageType } from "./images";
import type { RenderedImage, UploadedFile } from "../types";

const JPEG_BYTES = new Uint8Array([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10]);
const PNG_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00]);

function upload(overrides: Partial<UploadedFile>): UploadedFile {
  return {
    id: "upload-1",
    name: "dish.jpg",
    mimeType: "image/jpeg",
    size: JPEG_BYTES.length,
    bytes: JPEG_BYTES,
    ...overrides,
  };
}

describe("sniffImageType", () => {
  it("recognises JPEG and PNG signatures", () => {
    expect(sniffImageType(JPEG_BYTES)).toBe("image/jpeg");
    expect(sniffImageType(PNG_BYTES)).toBe("image/png");
    expect(sniffImageType(new Uint8Array([0x25, 0x50, 0x44, 0x46]))).toBeNull();
  });
});

describe("bytesToBase64", () => {
  it("encodes raw bytes", () => {
    expect(bytesToBase64(new Uint8Array([104, 105]))).toBe("aGk=");
  });
});

describe("renderNativeImage", () => {
  it("turns an uploaded JPEG into a single image", () => {
    const image = renderNativeImage(upload({}));

    expect(image.uploadId).toBe("upload-1");
    expect(image.sourceName).toBe("dish.jpg");
    expect(image.pageNumber).toBe(1);
    expect(image.totalPages).toBe(1);
    expect(image.mimeType).toBe("image/jpeg");
    expect(image.dataUrl).toBe("data:image/jpeg;base64,/9j/4AAQ");
  });

  it("rejects bytes that are not an image", () => {
    expect(() => renderNativeImage(upload({ bytes: new Uint8Array([1, 2, 3, 4]) }))).toThrow(
      new ConversionError("dish.jpg", "file is not a readable JPEG or PNG image."),
    );
  });

  it("rejects a PNG uploaded as JPEG", () => {
    expect(() => renderNativeImage(upload({ bytes: PNG_BYTES }))).toThrow(
      "dish.jpg: file content is image/png but was uploaded as image/jpeg.",
    );
  });
});

describe("imageLabel", () => {
  const base: RenderedImage = {
    id: "image-1",
    uploadId: "upload-1",
    sourceName: "dinner.pdf",
    pageNumber: 2,
    totalPages: 3,
    mimeType: "image/jpeg",
    dataUrl: "data:image/jpeg;base64,",
  };

  it("includes the page for multi-page sources", () => {
    expect(imageLabel(base)).toBe("dinner.pdf (page 2/3)");
  });

  it("uses the file name for single images", () => {
    expect(imageLabel({ ...base, pageNumber: 1, totalPages: 1 })).toBe("dinner.pdf");
  });
});
