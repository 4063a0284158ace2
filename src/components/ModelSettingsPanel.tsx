import { DEFAULT_OLLAMA_SETTINGS, sanitizeOllamaSettings } from "../lib/settings";
import type { BackendConfig, BackendKind, OllamaGenerationSettings } from "../types";

export type ConnectionSettings = Omit<BackendConfig, "ollama">;

interface ModelSettingsPanelProps {
  connection: ConnectionSettings;
  ollamaSettings: OllamaGenerationSettings;
  models: string[];
  loadingModels: boolean;
  modelError: string;
  rememberSettings: boolean;
  disabled: boolean;
  onKindChange: (kind: BackendKind) => void;
  onConnectionChange: (patch: Partial<ConnectionSettings>) => void;
  onOllamaChange: (settings: OllamaGenerationSettings) => void;
  onRememberChange: (remember: boolean) => void;
  onLoadModels: () => void;
}

type NumericOllamaKey = Exclude<keyof OllamaGenerationSettings, "useNativeToolCalling">;

const OLLAMA_FIELDS: Array<{
  key: NumericOllamaKey;
  label: string;
  min: number;
  max: number;
  step: number;
}> = [
  { key: "temperature", label: "Temperature", min: 0, max: 2, step: 0.05 },
  { key: "topP", label: "Top P", min: 0, max: 1, step: 0.05 },
  { key: "topK", label: "Top K", min: 0, max: 500, step: 1 },
  { key: "contextSize", label: "Context size (num_ctx)", min: 256, max: 262144, step: 256 },
];

export default function ModelSettingsPanel({
  connection,
  ollamaSettings,
  models,
  loadingModels,
  modelError,
  rememberSettings,
  disabled,
  onKindChange,
  onConnectionChange,
  onOllamaChange,
  onRememberChange,
  onLoadModels,
}: ModelSettingsPanelProps): JSX.Element {
  const isOllama = connection.kind === "ollama";

  function updateOllamaNumber(key: NumericOllamaKey, raw: string): void {
    const value = Number(raw);
    if (!Number.isFinite(value)) return;
    onOllamaChange(sanitizeOllamaSettings({ ...ollamaSettings, [key]: value }));
  }

  return (
    <section className="panel">
      <h2>1) Vision Model</h2>

      <label className="field">
        <span>Backend</span>
        <select
          value={connection.kind}
          onChange={(event) =>
            onKindChange(event.target.value === "ollama" ? "ollama" : "openai")
          }
          disabled={disabled}
        >
          <option value="openai">OpenAI-compatible</option>
          <option value="ollama">Ollama</option>
        </select>
      </label>

      <label className="field">
        <span>Base URL</span>
        <input
          value={connection.baseUrl}
          onChange={(event) => onConnectionChange({ baseUrl: event.target.value })}
          placeholder={isOllama ? "http://localhost:11434" : "https://api.openai.com/v1/"}
          disabled={disabled}
        />
      </label>

      {!isOllama && (
        <label className="field">
          <span>API key (kept in memory only)</span>
          <input
            type="password"
            value={connection.apiKey}
            onChange={(event) => onConnectionChange({ apiKey: event.target.value })}
            placeholder="sk-..."
            autoComplete="off"
            disabled={disabled}
          />
        </label>
      )}

      <label className="field">
        <span>Model</span>
        <input
          value={connection.model}
          list="vision-models"
          onChange={(event) => onConnectionChange({ model: event.target.value })}
          placeholder={isOllama ? "llava:13b" : "gpt-4o"}
          disabled={disabled}
        />
        <datalist id="vision-models">
          {models.map((entry) => (
            <option key={entry} value={entry} />
          ))}
        </datalist>
      </label>

      <div className="inline-actions">
        <button
          type="button"
          onClick={onLoadModels}
          disabled={disabled || loadingModels || !connection.baseUrl.trim()}
        >
          {loadingModels ? "Loading..." : "Load Models"}
        </button>
        <span className="muted">The model must accept image input.</span>
      </div>
      {modelError && <p className="alert warning">{modelError}</p>}

      {isOllama && (
        <div className="subpanel">
          <h3>Ollama generation</h3>
          <div className="split">
            {OLLAMA_FIELDS.map((field) => (
              <label key={field.key} className="field">
                <span>{field.label}</span>
                <input
                  type="number"
                  min={field.min}
                  max={field.max}
                  step={field.step}
                  value={ollamaSettings[field.key]}
                  onChange={(event) => updateOllamaNumber(field.key, event.target.value)}
                  disabled={disabled}
                />
              </label>
            ))}
          </div>
          <label className="checkbox">
            <input
              type="checkbox"
              checked={ollamaSettings.useNativeToolCalling}
              onChange={(event) =>
                onOllamaChange({
                  ...ollamaSettings,
                  useNativeToolCalling: event.target.checked,
                })
              }
              disabled={disabled}
            />
            <span>Ask for menu items through a tool call</span>
          </label>
          <button
            type="button"
            onClick={() => onOllamaChange(DEFAULT_OLLAMA_SETTINGS)}
            disabled={disabled}
          >
            Reset Ollama Defaults
          </button>
        </div>
      )}

      <label className="checkbox">
        <input
          type="checkbox"
          checked={rememberSettings}
          onChange={(event) => onRememberChange(event.target.checked)}
          disabled={disabled}
        />
        <span>Remember these settings in this browser (never the API key)</span>
      </label>
    </section>
  );
}
