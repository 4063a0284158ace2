export type BackendKind = "openai" | "ollama";

export interface BackendConfig {
  kind: BackendKind;
  baseUrl: string;
  apiKey: string;
  model: string;
  ollama?: OllamaGenerationSettings;
}

export type LogLevel = "info" | "warning" | "error";

export interface LogEntry {
  id: string;
  level: LogLevel;
  message: string;
  timestamp: string;
}

export type SupportedMimeType = "application/pdf" | "image/jpeg" | "image/png";

export interface UploadCandidate {
  name: string;
  type: string;
  size: number;
  bytes: Uint8Array;
}

export interface UploadedFile {
  id: string;
  name: string;
  mimeType: SupportedMimeType;
  size: number;
  bytes: Uint8Array;
}

export interface RenderedImage {
  id: string;
  uploadId: string;
  sourceName: string;
  pageNumber: number;
  totalPages: number;
  mimeType: "image/jpeg" | "image/png";
  dataUrl: string;
}

export type DietaryLabel = "veg" | "non-veg" | "spicy" | "unknown";

export interface MenuItem {
  id: string;
  source: string;
  name: string;
  prices: number[];
  price_labels: string[];
  description: string;
  dietary_label: DietaryLabel;
  flags: string[];
}

export type PipelineStage = "render" | "extract" | "edit" | "import";

export interface StageFailure {
  id: string;
  stage: PipelineStage;
  subject: string;
  message: string;
}

export interface MenuSession {
  id: string;
  uploads: UploadedFile[];
  images: RenderedImage[];
  selectedImageIds: string[];
  items: MenuItem[];
  failures: StageFailure[];
}

export interface RawModelOutput {
  imageLabel: string;
  text: string;
}

export interface RunProgress {
  totalImages: number;
  completedImages: number;
  currentImage: string;
}

export interface PromptConfig {
  menuSystem: string;
}

export interface RenderSettings {
  scale: number;
  maxDimension: number;
  jpegQuality: number;
}

export interface OllamaGenerationSettings {
  temperature: number;
  topP: number;
  topK: number;
  minP: number;
  repeatPenalty: number;
  contextSize: number;
  useNativeToolCalling: boolean;
}
