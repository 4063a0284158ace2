import {
  HttpError,
  TransportError,
  runChatCompletion,
  type ChatMessage,
  type NativeToolDefinition,
} from "./backend";
import { ExtractionError, errorMessage } from "./errors";
import { imageLabel } from "./images";
import type { LogSink } from "./log";
import { decodeMenuRecords, extractJsonPayload, type MenuDecodeResult } from "./menuItems";
import { DEFAULT_PROMPT_CONFIG, MENU_EXTRACTION_INSTRUCTION } from "./prompts";
import type {
  BackendConfig,
  MenuItem,
  PromptConfig,
  RawModelOutput,
  RenderedImage,
  RunProgress,
} from "../types";

export interface ExtractionCallbacks {
  onLog?: LogSink;
  onProgress?: (progress: RunProgress) => void;
}

export interface RunExtractionOptions extends ExtractionCallbacks {
  config: BackendConfig;
  prompts?: PromptConfig;
}

export interface ImageExtraction extends MenuDecodeResult {
  rawOutput: string;
}

export interface ExtractionRunResult {
  items: MenuItem[];
  failures: ExtractionError[];
  rawOutputs: RawModelOutput[];
}

const MAX_RESPONSE_TOKENS = 4096;

const MENU_ITEMS_TOOL: NativeToolDefinition = {
  name: "return_menu_items",
  description: "Return the menu items visible in one menu page image.",
  parameters: {
    type: "object",
    properties: {
      items: {
        type: "array",
        items: {
          type: "object",
          properties: {
            name: { type: "string" },
            prices: { type: "array", items: { type: "number" } },
            price_labels: { type: "array", items: { type: "string" } },
            description: { type: "string" },
            dietary_label: {
              type: "string",
              enum: ["veg", "non-veg", "spicy", "unknown"],
            },
          },
          required: ["name", "prices", "price_labels"],
        },
      },
    },
    required: ["items"],
  },
};

function buildMenuRequestMessages(
  systemPrompt: string,
  image: RenderedImage,
): ChatMessage[] {
  return [
    { role: "system", content: systemPrompt },
    {
      role: "user",
      content: [
        { type: "text", text: MENU_EXTRACTION_INSTRUCTION },
        { type: "image_url", image_url: { url: image.dataUrl } },
      ],
    },
  ];
}

function toExtractionError(error: unknown, label: string): ExtractionError {
  if (error instanceof ExtractionError) {
    return error;
  }
  if (error instanceof TransportError) {
    return new ExtractionError("network", label, error.message);
  }
  if (error instanceof HttpError) {
    if (error.status === 401 || error.status === 403) {
      return new ExtractionError(
        "auth",
        label,
        `The endpoint rejected the API key (HTTP ${error.status}).`,
      );
    }
    return new ExtractionError("http", label, error.message);
  }
  return new ExtractionError(
    "response",
    label,
    errorMessage(error, "Unknown extraction error"),
  );
}

/**
 * Sends one image to the model and decodes the reply. A single attempt;
 * every failure surfaces as an ExtractionError.
 */
export async function extractMenuItemsFromImage(
  image: RenderedImage,
  options: RunExtractionOptions,
): Promise<ImageExtraction> {
  const label = imageLabel(image);
  if (!options.config.baseUrl.trim()) {
    throw new ExtractionError("config", label, "No endpoint base URL is set.");
  }
  if (!options.config.model.trim()) {
    throw new ExtractionError("config", label, "No vision model is set.");
  }
  const systemPrompt =
    options.prompts?.menuSystem?.trim() || DEFAULT_PROMPT_CONFIG.menuSystem;

  let responseText: string;
  try {
    responseText = await runChatCompletion(
      options.config,
      buildMenuRequestMessages(systemPrompt, image),
      {
        responseFormat: "json_object",
        maxTokens: MAX_RESPONSE_TOKENS,
        tool: MENU_ITEMS_TOOL,
      },
    );
  } catch (error) {
    throw toExtractionError(error, label);
  }

  try {
    return {
      ...decodeMenuRecords(extractJsonPayload(responseText), label),
      rawOutput: responseText,
    };
  } catch (error) {
    throw new ExtractionError(
      "response",
      label,
      `Could not read menu items from the model response. ${errorMessage(error, "Unknown parse error")}`,
    );
  }
}

export async function runMenuExtraction(
  images: RenderedImage[],
  options: RunExtractionOptions,
): Promise<ExtractionRunResult> {
  const items: MenuItem[] = [];
  const failures: ExtractionError[] = [];
  const rawOutputs: RawModelOutput[] = [];
  const totalImages = images.length;

  for (const [index, image] of images.entries()) {
    const label = imageLabel(image);
    options.onProgress?.({
      totalImages,
      completedImages: index,
      currentImage: label,
    });

    try {
      options.onLog?.("info", `Extracting menu items from ${label}.`);
      const decoded = await extractMenuItemsFromImage(image, options);

      decoded.warnings.forEach((warning) => {
        options.onLog?.("warning", `${label}: ${warning}`);
      });
      decoded.rejected.forEach((reason) => {
        options.onLog?.("warning", `${label}: skipped record. ${reason}`);
      });

      const flagged = decoded.items.filter((item) => item.flags.length > 0);
      if (flagged.length > 0) {
        options.onLog?.(
          "warning",
          `${label}: ${flagged.length} item(s) need review (price/label mismatch or missing data).`,
        );
      }
      if (decoded.items.length === 0) {
        options.onLog?.("warning", `${label}: the model returned no menu items.`);
      } else {
        options.onLog?.("info", `${label}: extracted ${decoded.items.length} item(s).`);
      }

      items.push(...decoded.items);
      rawOutputs.push({ imageLabel: label, text: decoded.rawOutput });
    } catch (error) {
      const failure = toExtractionError(error, label);
      failures.push(failure);
      options.onLog?.("error", `Extraction failed for ${failure.message}`);
    }
  }

  options.onProgress?.({
    totalImages,
    completedImages: totalImages,
    currentImage: "",
  });

  return { items, failures, rawOutputs };
}
