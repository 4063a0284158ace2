import { describe, expect, it } from "vitest";
import { DEFAULT_PROMPT_CONFIG } from "./prompts";
import {
  DEFAULT_OLLAMA_SETTINGS,
  DEFAULT_RENDER_SETTINGS,
  SETTINGS_KEY,
  loadSavedSettings,
  readEnvDefaults,
  sanitizeRenderSettings,
  saveSettings,
  type SavedSettings,
  type SettingsStorage,
} from "./settings";

function memoryStorage(initial: Record<string, string> = {}): SettingsStorage & {
  values: Map<string, string>;
} {
  const values = new Map(Object.entries(initial));
  return {
    values,
    getItem: (key) => values.get(key) ?? null,
    setItem: (key, value) => {
      values.set(key, value);
    },
    removeItem: (key) => {
      values.delete(key);
    },
  };
}

const saved: SavedSettings = {
  rememberSettings: true,
  backendKind: "ollama",
  baseUrl: "http://localhost:11434",
  model: "llava:13b",
  promptConfig: { menuSystem: "Read every dish." },
  renderSettings: DEFAULT_RENDER_SETTINGS,
  ollamaSettings: DEFAULT_OLLAMA_SETTINGS,
};

describe("readEnvDefaults", () => {
  it("falls back to the public endpoint and model", () => {
    expect(readEnvDefaults({})).toEqual({
      apiKey: "",
      baseUrl: "https://api.openai.com/v1/",
      model: "gpt-4o",
    });
  });

  it("trims configured values", () => {
    expect(
      readEnvDefaults({
        VITE_OPENAI_API_KEY: " test-secret ",
        VITE_OPENAI_BASE_URL: "https://llm.test/v1",
        VITE_OPENAI_MODEL: "vision-model",
      }),
    ).toEqual({
      apiKey: "test-secret",
      baseUrl: "https://llm.test/v1",
      model: "vision-model",
    });
  });
});

describe("sanitizeRenderSettings", () => {
  it("clamps out-of-range values", () => {
    expect(
      sanitizeRenderSettings({ scale: 10, maxDimension: 100.7, jpegQuality: Number.NaN }),
    ).toEqual({ scale: 4, maxDimension: 512, jpegQuality: 0.86 });
  });
});

describe("saved settings", () => {
  it("round-trips remembered settings", () => {
    const storage = memoryStorage();

    saveSettings(storage, saved);

    expect(loadSavedSettings(storage)).toEqual(saved);
  });

  it("removes the entry when remembering is switched off", () => {
    const storage = memoryStorage({ [SETTINGS_KEY]: JSON.stringify(saved) });

    saveSettings(storage, { ...saved, rememberSettings: false });

    expect(storage.values.has(SETTINGS_KEY)).toBe(false);
  });

  it("ignores malformed entries", () => {
    expect(loadSavedSettings(memoryStorage({ [SETTINGS_KEY]: "{not json" }))).toBeNull();
  });

  it("drops Ollama values of the wrong type", () => {
    const storage = memoryStorage({
      [SETTINGS_KEY]: JSON.stringify({
        rememberSettings: true,
        backendKind: "ollama",
        ollamaSettings: { useNativeToolCalling: "yes", topK: "many" },
      }),
    });

    expect(loadSavedSettings(storage)?.ollamaSettings).toEqual(DEFAULT_OLLAMA_SETTINGS);
  });

  it("fills gaps in an older entry with defaults", () => {
    const storage = memoryStorage({
      [SETTINGS_KEY]: JSON.stringify({ rememberSettings: true, backendKind: "openai" }),
    });

    expect(loadSavedSettings(storage)).toEqual({
      rememberSettings: true,
      backendKind: "openai",
      baseUrl: "https://api.openai.com/v1/",
      model: "",
      promptConfig: DEFAULT_PROMPT_CONFIG,
      renderSettings: DEFAULT_RENDER_SETTINGS,
      ollamaSettings: DEFAULT_OLLAMA_SETTINGS,
    });
  });
});
