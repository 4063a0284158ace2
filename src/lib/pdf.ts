import { getDocument } from "pdfjs-dist";
import { ConversionError, errorMessage } from "./errors";
import { createId } from "./log";
import { DEFAULT_RENDER_SETTINGS, sanitizeRenderSettings } from "./settings";
import type { RenderSettings, RenderedImage, UploadedFile } from "../types";

export interface PageCanvas {
  width: number;
  height: number;
  getContext(contextId: "2d"): CanvasRenderingContext2D | null;
  toDataURL(type?: string, quality?: number): string;
}

export type CanvasFactory = () => PageCanvas;

export interface RenderPdfOptions {
  render?: Partial<RenderSettings>;
  createCanvas?: CanvasFactory;
  onPage?: (pageNumber: number, totalPages: number) => void;
}

const PDF_HEADER = "%PDF-";

function createDocumentCanvas(): PageCanvas {
  return document.createElement("canvas");
}

function hasPdfHeader(bytes: Uint8Array): boolean {
  // Some generators put a few junk bytes before the header.
  const head = String.fromCharCode(...bytes.subarray(0, 1024));
  return head.includes(PDF_HEADER);
}

function scaleForPage(
  baseWidth: number,
  baseHeight: number,
  settings: RenderSettings,
): number {
  const largestSide = Math.max(baseWidth, baseHeight);
  if (largestSide <= 0) return settings.scale;
  return Math.max(0.6, Math.min(settings.scale, settings.maxDimension / largestSide));
}

/**
 * Rasterises every page of a PDF upload to a JPEG data URL, one
 * RenderedImage per page, in page order.
 */
export async function renderPdfPages(
  upload: UploadedFile,
  options: RenderPdfOptions = {},
): Promise<RenderedImage[]> {
  if (!hasPdfHeader(upload.bytes)) {
    throw new ConversionError(upload.name, "file is not a PDF document.");
  }

  const settings = sanitizeRenderSettings({
    ...DEFAULT_RENDER_SETTINGS,
    ...options.render,
  });
  const createCanvas = options.createCanvas ?? createDocumentCanvas;

  // pdf.js takes ownership of the buffer it is given.
  const loadingTask = getDocument({ data: upload.bytes.slice() });
  try {
    const pdf = await loadingTask.promise.catch((error: unknown) => {
      throw new ConversionError(
        upload.name,
        `could not open PDF. ${errorMessage(error, "Unknown PDF error")}`,
      );
    });

    const totalPages = pdf.numPages;
    if (totalPages === 0) {
      throw new ConversionError(upload.name, "PDF has no pages.");
    }

    const images: RenderedImage[] = [];
    for (let pageNumber = 1; pageNumber <= totalPages; pageNumber += 1) {
      const page = await pdf.getPage(pageNumber);
      const baseViewport = page.getViewport({ scale: 1 });
      const viewport = page.getViewport({
        scale: scaleForPage(baseViewport.width, baseViewport.height, settings),
      });

      const canvas = createCanvas();
      canvas.width = Math.max(1, Math.floor(viewport.width));
      canvas.height = Math.max(1, Math.floor(viewport.height));
      const context = canvas.getContext("2d");
      if (!context) {
        throw new ConversionError(
          upload.name,
          "could not create a canvas context for page rendering.",
        );
      }

      try {
        await page.render({ canvasContext: context, viewport }).promise;
      } catch (error) {
        throw new ConversionError(
          upload.name,
          `page ${pageNumber} could not be rendered. ${errorMessage(error, "Unknown render error")}`,
        );
      }

      images.push({
        id: createId(),
        uploadId: upload.id,
        sourceName: upload.name,
        pageNumber,
        totalPages,
        mimeType: "image/jpeg",
        dataUrl: canvas.toDataURL("image/jpeg", settings.jpegQuality),
      });
      page.cleanup();
      options.onPage?.(pageNumber, totalPages);
    }

    return images;
  } finally {
    await loadingTask.destroy();
  }
}
