import {
  ConversionError,
  errorMessage,
  type UploadValidationError,
} from "./errors";
import {
  runMenuExtraction,
  type ExtractionRunResult,
  type RunExtractionOptions,
} from "./extractor";
import { renderNativeImage } from "./images";
import type { LogSink } from "./log";
import { renderPdfPages, type RenderPdfOptions } from "./pdf";
import {
  acceptUploads,
  attachRenderedImages,
  clearFailures,
  recordFailure,
  replaceMenuItems,
  selectedImages,
} from "./session";
import type {
  MenuSession,
  RenderedImage,
  UploadCandidate,
  UploadedFile,
} from "../types";

export interface UploadCommandOptions extends RenderPdfOptions {
  onLog?: LogSink;
}

export interface UploadCommandResult {
  session: MenuSession;
  rejected: UploadValidationError[];
}

export async function renderUpload(
  upload: UploadedFile,
  options: RenderPdfOptions = {},
): Promise<RenderedImage[]> {
  if (upload.mimeType === "application/pdf") {
    return renderPdfPages(upload, options);
  }
  return [renderNativeImage(upload)];
}

/**
 * Validates and stores new files, then renders every accepted file. Rejected
 * files are returned beside the session and never touch it, so a batch with
 * nothing valid gives back the same session object. Conversion failures are
 * recorded on the session and the rest continue.
 */
export async function uploadFiles(
  session: MenuSession,
  candidates: UploadCandidate[],
  options: UploadCommandOptions = {},
): Promise<UploadCommandResult> {
  const result = acceptUploads(session, candidates);
  let next = result.session;

  for (const error of result.errors) {
    options.onLog?.("error", error.message);
  }
  for (const name of result.duplicates) {
    options.onLog?.("info", `${name} is already uploaded; skipped.`);
  }

  for (const upload of result.accepted) {
    try {
      const images = await renderUpload(upload, options);
      next = attachRenderedImages(next, images);
      options.onLog?.(
        "info",
        `${upload.name}: prepared ${images.length} image(s).`,
      );
    } catch (error) {
      const message =
        error instanceof ConversionError
          ? error.message
          : `${upload.name}: ${errorMessage(error, "Unknown conversion error")}`;
      options.onLog?.("error", message);
      next = recordFailure(next, "render", upload.name, message);
    }
  }

  return { session: next, rejected: result.errors };
}

export interface SelectedExtraction extends ExtractionRunResult {
  imageCount: number;
}

/** Runs extraction over the selected images, one at a time. */
export async function runSelectedExtraction(
  session: MenuSession,
  options: RunExtractionOptions,
): Promise<SelectedExtraction> {
  const images = selectedImages(session);
  if (images.length === 0) {
    options.onLog?.("warning", "Select at least one page or image to process.");
    return { items: [], failures: [], rawOutputs: [], imageCount: 0 };
  }

  const result = await runMenuExtraction(images, options);
  options.onLog?.(
    result.failures.length > 0 ? "warning" : "info",
    `Extraction finished: ${result.items.length} item(s) from ${images.length - result.failures.length}/${images.length} image(s).`,
  );
  return { ...result, imageCount: images.length };
}

/**
 * Folds a finished run into the session as it stands now, not as it was when
 * the run started. The new rows replace those of any previous run.
 */
export function applyExtraction(
  session: MenuSession,
  run: SelectedExtraction,
): MenuSession {
  let next = clearFailures(session, "extract");
  if (run.imageCount === 0) return next;

  next = replaceMenuItems(next, run.items);
  for (const failure of run.failures) {
    next = recordFailure(next, "extract", failure.imageLabel, failure.message);
  }
  return next;
}
