import { DEFAULT_PROMPT_CONFIG } from "./prompts";
import type {
  BackendKind,
  OllamaGenerationSettings,
  PromptConfig,
  RenderSettings,
} from "../types";

export const SETTINGS_KEY = "menu-extractor.settings.v1";
export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1/";
export const DEFAULT_OLLAMA_BASE_URL = "http://localhost:11434";
export const DEFAULT_OPENAI_MODEL = "gpt-4o";

export const DEFAULT_RENDER_SETTINGS: RenderSettings = {
  scale: 2,
  maxDimension: 2000,
  jpegQuality: 0.86,
};

export const DEFAULT_OLLAMA_SETTINGS: OllamaGenerationSettings = {
  temperature: 0,
  topP: 0.9,
  topK: 40,
  minP: 0,
  repeatPenalty: 1.1,
  contextSize: 8192,
  useNativeToolCalling: false,
};

export interface EnvDefaults {
  apiKey: string;
  baseUrl: string;
  model: string;
}

export interface SavedSettings {
  rememberSettings: boolean;
  backendKind: BackendKind;
  baseUrl: string;
  model: string;
  promptConfig: PromptConfig;
  renderSettings: RenderSettings;
  ollamaSettings: OllamaGenerationSettings;
}

export interface SettingsStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export function defaultBaseUrlForBackend(kind: BackendKind): string {
  return kind === "openai" ? DEFAULT_OPENAI_BASE_URL : DEFAULT_OLLAMA_BASE_URL;
}

function toFiniteNumber(value: unknown, fallback: number): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return fallback;
  }
  return value;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function readString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function sanitizeRenderSettings(
  input: Partial<RenderSettings> | undefined,
): RenderSettings {
  return {
    scale: clamp(
      toFiniteNumber(input?.scale, DEFAULT_RENDER_SETTINGS.scale),
      0.5,
      4,
    ),
    maxDimension: Math.floor(
      clamp(
        toFiniteNumber(input?.maxDimension, DEFAULT_RENDER_SETTINGS.maxDimension),
        512,
        4096,
      ),
    ),
    jpegQuality: clamp(
      toFiniteNumber(input?.jpegQuality, DEFAULT_RENDER_SETTINGS.jpegQuality),
      0.3,
      1,
    ),
  };
}

export function sanitizeOllamaSettings(
  input: Partial<OllamaGenerationSettings> | undefined,
): OllamaGenerationSettings {
  return {
    temperature: clamp(
      toFiniteNumber(input?.temperature, DEFAULT_OLLAMA_SETTINGS.temperature),
      0,
      2,
    ),
    topP: clamp(toFiniteNumber(input?.topP, DEFAULT_OLLAMA_SETTINGS.topP), 0, 1),
    topK: Math.floor(
      clamp(toFiniteNumber(input?.topK, DEFAULT_OLLAMA_SETTINGS.topK), 0, 500),
    ),
    minP: clamp(toFiniteNumber(input?.minP, DEFAULT_OLLAMA_SETTINGS.minP), 0, 1),
    repeatPenalty: clamp(
      toFiniteNumber(
        input?.repeatPenalty,
        DEFAULT_OLLAMA_SETTINGS.repeatPenalty,
      ),
      0.5,
      3,
    ),
    contextSize: Math.floor(
      clamp(
        toFiniteNumber(input?.contextSize, DEFAULT_OLLAMA_SETTINGS.contextSize),
        256,
        262144,
      ),
    ),
    useNativeToolCalling:
      typeof input?.useNativeToolCalling === "boolean"
        ? input.useNativeToolCalling
        : DEFAULT_OLLAMA_SETTINGS.useNativeToolCalling,
  };
}

/**
 * Reads the optional build-time defaults. Only the API key is secret; it is
 * used to prefill the field and is never written back to storage.
 */
export function readEnvDefaults(env: Partial<ImportMetaEnv>): EnvDefaults {
  return {
    apiKey: readString(env.VITE_OPENAI_API_KEY),
    baseUrl: readString(env.VITE_OPENAI_BASE_URL) || DEFAULT_OPENAI_BASE_URL,
    model: readString(env.VITE_OPENAI_MODEL) || DEFAULT_OPENAI_MODEL,
  };
}

export function loadSavedSettings(storage: SettingsStorage): SavedSettings | null {
  try {
    const raw = storage.getItem(SETTINGS_KEY);
    if (!raw) return null;
    const parsed = JSON.parse(raw) as Partial<SavedSettings>;
    if (!parsed.rememberSettings) return null;

    const backendKind: BackendKind =
      parsed.backendKind === "ollama" ? "ollama" : "openai";
    const menuSystem = readString(parsed.promptConfig?.menuSystem);

    return {
      rememberSettings: true,
      backendKind,
      baseUrl: readString(parsed.baseUrl) || defaultBaseUrlForBackend(backendKind),
      model: readString(parsed.model),
      promptConfig: menuSystem ? { menuSystem } : DEFAULT_PROMPT_CONFIG,
      renderSettings: sanitizeRenderSettings(parsed.renderSettings),
      ollamaSettings: sanitizeOllamaSettings(parsed.ollamaSettings),
    };
  } catch {
    // Malformed local settings fall back to defaults.
    return null;
  }
}

export function saveSettings(
  storage: SettingsStorage,
  settings: SavedSettings,
): void {
  if (!settings.rememberSettings) {
    storage.removeItem(SETTINGS_KEY);
    return;
  }
  storage.setItem(SETTINGS_KEY, JSON.stringify(settings));
}
