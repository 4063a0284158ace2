import { useEffect, useMemo, useRef, useState } from "react";
import MenuItemsTable from "./components/MenuItemsTable";
import ModelSettingsPanel, {
  type ConnectionSettings,
} from "./components/ModelSettingsPanel";
import PageGallery from "./components/PageGallery";
import { listModels } from "./lib/backend";
import type { MenuItemEdit } from "./lib/editor";
import { errorMessage } from "./lib/errors";
import {
  buildExportDocument,
  downloadExport,
  parseMenuCsv,
  parseMenuJson,
  triggerDownload,
  type ExportFormat,
} from "./lib/exporters";
import { createLog } from "./lib/log";
import { applyExtraction, runSelectedExtraction, uploadFiles } from "./lib/pipeline";
import {
  DEFAULT_PROMPT_CONFIG,
  parsePromptConfigMarkdown,
  promptConfigToMarkdown,
} from "./lib/prompts";
import {
  clearFailures,
  createSession,
  editMenuItem,
  recordFailure,
  removeMenuItem,
  removeUpload,
  replaceMenuItems,
  resetSession,
  selectAllImages,
  setImageSelection,
  toggleImageSelection,
} from "./lib/session";
import {
  DEFAULT_OLLAMA_SETTINGS,
  DEFAULT_RENDER_SETTINGS,
  defaultBaseUrlForBackend,
  loadSavedSettings,
  readEnvDefaults,
  sanitizeRenderSettings,
  saveSettings,
} from "./lib/settings";
import { UPLOAD_ACCEPT, formatBytes, readUploadCandidate } from "./lib/uploads";
import type {
  BackendKind,
  LogEntry,
  LogLevel,
  MenuSession,
  OllamaGenerationSettings,
  PipelineStage,
  PromptConfig,
  RawModelOutput,
  RenderSettings,
  RunProgress,
} from "./types";

type Activity = "idle" | "uploading" | "extracting";

const EXPORT_FORMATS: ExportFormat[] = ["json", "csv", "xlsx"];

const envDefaults = readEnvDefaults(import.meta.env);

function failuresFor(session: MenuSession, stages: PipelineStage[]) {
  return session.failures.filter((failure) => stages.includes(failure.stage));
}

export default function App(): JSX.Element {
  const uploadInputRef = useRef<HTMLInputElement>(null);
  const importInputRef = useRef<HTMLInputElement>(null);
  const promptInputRef = useRef<HTMLInputElement>(null);

  const [connection, setConnection] = useState<ConnectionSettings>({
    kind: "openai",
    baseUrl: envDefaults.baseUrl,
    apiKey: envDefaults.apiKey,
    model: envDefaults.model,
  });
  const [ollamaSettings, setOllamaSettings] = useState<OllamaGenerationSettings>(
    DEFAULT_OLLAMA_SETTINGS,
  );
  const [renderSettings, setRenderSettings] = useState<RenderSettings>(
    DEFAULT_RENDER_SETTINGS,
  );
  const [promptConfig, setPromptConfig] =
    useState<PromptConfig>(DEFAULT_PROMPT_CONFIG);
  const [rememberSettings, setRememberSettings] = useState(false);
  const [models, setModels] = useState<string[]>([]);
  const [loadingModels, setLoadingModels] = useState(false);
  const [modelError, setModelError] = useState("");

  const [session, setSession] = useState<MenuSession>(createSession);
  const [activity, setActivity] = useState<Activity>("idle");
  const [progress, setProgress] = useState<RunProgress | null>(null);
  const [dragging, setDragging] = useState(false);
  const [rejectedUploads, setRejectedUploads] = useState<string[]>([]);
  const [rawOutputs, setRawOutputs] = useState<RawModelOutput[]>([]);
  const [logs, setLogs] = useState<LogEntry[]>([]);

  const busy = activity !== "idle";
  const flaggedCount = useMemo(
    () => session.items.filter((item) => item.flags.length > 0).length,
    [session.items],
  );

  useEffect(() => {
    const saved = loadSavedSettings(localStorage);
    if (!saved) return;
    setRememberSettings(true);
    setConnection((previous) => ({
      ...previous,
      kind: saved.backendKind,
      baseUrl: saved.baseUrl,
      model: saved.model || previous.model,
    }));
    setPromptConfig(saved.promptConfig);
    setRenderSettings(saved.renderSettings);
    setOllamaSettings(saved.ollamaSettings);
  }, []);

  useEffect(() => {
    saveSettings(localStorage, {
      rememberSettings,
      backendKind: connection.kind,
      baseUrl: connection.baseUrl,
      model: connection.model,
      promptConfig,
      renderSettings,
      ollamaSettings,
    });
  }, [
    rememberSettings,
    connection.kind,
    connection.baseUrl,
    connection.model,
    promptConfig,
    renderSettings,
    ollamaSettings,
  ]);

  function log(level: LogLevel, message: string): void {
    setLogs((previous) => [...previous, createLog(level, message)]);
  }

  function handleKindChange(kind: BackendKind): void {
    setConnection((previous) => ({
      ...previous,
      kind,
      baseUrl: kind === "openai" ? envDefaults.baseUrl : defaultBaseUrlForBackend(kind),
    }));
    setModels([]);
    setModelError("");
  }

  async function handleLoadModels(): Promise<void> {
    setModelError("");
    setLoadingModels(true);
    try {
      const loaded = await listModels(connection);
      setModels(loaded);
      if (!loaded.includes(connection.model)) {
        setConnection((previous) => ({ ...previous, model: loaded[0] ?? "" }));
      }
      log("info", `Found ${loaded.length} model(s).`);
    } catch (error) {
      const message = errorMessage(error, "Unknown error");
      setModels([]);
      setModelError(message);
      log("warning", `Could not list models; type a model ID instead. ${message}`);
    } finally {
      setLoadingModels(false);
    }
  }

  async function handleUpload(files: FileList | null): Promise<void> {
    if (busy || !files || files.length === 0) return;
    setActivity("uploading");
    try {
      const candidates = await Promise.all(Array.from(files).map(readUploadCandidate));
      const result = await uploadFiles(session, candidates, {
        render: renderSettings,
        onLog: log,
      });
      setRejectedUploads(result.rejected.map((error) => error.message));
      setSession(result.session);
    } catch (error) {
      log("error", `Upload failed: ${errorMessage(error, "Unknown upload error")}`);
    } finally {
      setActivity("idle");
    }
  }

  function connectionProblem(): string | null {
    if (!connection.baseUrl.trim()) return "Enter the model endpoint's base URL.";
    if (!connection.model.trim()) return "Enter a vision-capable model ID.";
    if (connection.kind === "openai" && !connection.apiKey.trim()) {
      return "Enter an API key for the OpenAI-compatible endpoint.";
    }
    return null;
  }

  async function handleExtract(): Promise<void> {
    if (busy) return;
    const problem = connectionProblem();
    if (problem) {
      log("error", problem);
      return;
    }

    setActivity("extracting");
    setProgress({
      totalImages: session.selectedImageIds.length,
      completedImages: 0,
      currentImage: "",
    });
    try {
      const run = await runSelectedExtraction(session, {
        config: {
          ...connection,
          baseUrl: connection.baseUrl.trim(),
          model: connection.model.trim(),
          ollama: connection.kind === "ollama" ? ollamaSettings : undefined,
        },
        prompts: promptConfig,
        onLog: log,
        onProgress: setProgress,
      });
      if (run.imageCount > 0) setRawOutputs(run.rawOutputs);
      setSession((current) => applyExtraction(current, run));
    } catch (error) {
      log("error", `Extraction stopped: ${errorMessage(error, "Unknown extraction error")}`);
    } finally {
      setActivity("idle");
    }
  }

  function handleEdit(itemId: string, edit: MenuItemEdit): boolean {
    const result = editMenuItem(clearFailures(session, "edit"), itemId, edit);
    if (result.error) {
      log("warning", `Edit not applied: ${result.error.message}`);
      setSession(recordFailure(result.session, "edit", itemId, result.error.message));
      return false;
    }
    setSession(result.session);
    return true;
  }

  function handleExport(format: ExportFormat): void {
    try {
      const exported = buildExportDocument(session.items, format);
      downloadExport(exported);
      log("info", `Saved ${session.items.length} item(s) to ${exported.fileName}.`);
    } catch (error) {
      log("error", `Export failed: ${errorMessage(error, "Unknown export error")}`);
    }
  }

  async function handleImport(files: FileList | null): Promise<void> {
    const file = files?.[0];
    if (!file) return;
    const base = clearFailures(session, "import");
    try {
      const text = await file.text();
      const decoded = file.name.toLowerCase().endsWith(".csv")
        ? parseMenuCsv(text, file.name)
        : parseMenuJson(text, file.name);
      decoded.rejected.forEach((reason) =>
        log("warning", `${file.name}: skipped record. ${reason}`),
      );
      decoded.warnings.forEach((warning) => log("warning", `${file.name}: ${warning}`));
      setSession(replaceMenuItems(base, decoded.items));
      log("info", `Loaded ${decoded.items.length} item(s) from ${file.name}.`);
    } catch (error) {
      const message = `${file.name}: ${errorMessage(error, "Unknown import error")}`;
      log("error", `Import failed. ${message}`);
      setSession(recordFailure(base, "import", file.name, message));
    }
  }

  async function handlePromptImport(files: FileList | null): Promise<void> {
    const file = files?.[0];
    if (!file) return;
    try {
      setPromptConfig(parsePromptConfigMarkdown(await file.text()));
      log("info", `Loaded extraction prompt from ${file.name}.`);
    } catch (error) {
      log("error", `Prompt import failed: ${errorMessage(error, "Unknown prompt error")}`);
    }
  }

  function handlePromptExport(): void {
    const blob = new Blob([promptConfigToMarkdown(promptConfig)], {
      type: "text/markdown;charset=utf-8;",
    });
    triggerDownload(blob, "menu-extractor-prompt.md");
  }

  function handleReset(): void {
    setSession(resetSession());
    setRejectedUploads([]);
    setRawOutputs([]);
    setProgress(null);
    log("info", "Started a new session.");
  }

  function updateRenderSetting(key: keyof RenderSettings, raw: string): void {
    const value = Number(raw);
    if (!Number.isFinite(value)) return;
    setRenderSettings((previous) => sanitizeRenderSettings({ ...previous, [key]: value }));
  }

  const percent =
    progress && progress.totalImages > 0
      ? Math.round((progress.completedImages / progress.totalImages) * 100)
      : 0;

  return (
    <div className="app-shell">
      <header className="hero">
        <h1>Menu Extractor</h1>
        <p>
          Turn menu PDFs and photos into structured rows: pick the pages, let a
          vision model read the dishes and prices, correct anything it missed,
          then download JSON, CSV or XLSX.
        </p>
      </header>

      <main className="grid">
        <ModelSettingsPanel
          connection={connection}
          ollamaSettings={ollamaSettings}
          models={models}
          loadingModels={loadingModels}
          modelError={modelError}
          rememberSettings={rememberSettings}
          disabled={busy}
          onKindChange={handleKindChange}
          onConnectionChange={(patch) =>
            setConnection((previous) => ({ ...previous, ...patch }))
          }
          onOllamaChange={setOllamaSettings}
          onRememberChange={setRememberSettings}
          onLoadModels={() => void handleLoadModels()}
        />

        <section className="panel">
          <h2>2) Menu Files</h2>
          <div
            className={`dropzone ${dragging ? "active" : ""}`}
            onDragOver={(event) => {
              event.preventDefault();
              if (!busy) setDragging(true);
            }}
            onDragLeave={() => setDragging(false)}
            onDrop={(event) => {
              event.preventDefault();
              setDragging(false);
              if (busy) return;
              void handleUpload(event.dataTransfer.files);
            }}
          >
            <p>Drop PDF, JPEG or PNG menus here.</p>
            <button
              type="button"
              onClick={() => uploadInputRef.current?.click()}
              disabled={busy}
            >
              {activity === "uploading" ? "Preparing pages..." : "Choose Files"}
            </button>
            <input
              ref={uploadInputRef}
              type="file"
              accept={UPLOAD_ACCEPT}
              multiple
              hidden
              onChange={(event) => {
                void handleUpload(event.target.files);
                event.currentTarget.value = "";
              }}
            />
          </div>

          <div className="file-list">
            {session.uploads.length === 0 ? (
              <p className="muted">Nothing uploaded in this session.</p>
            ) : (
              session.uploads.map((upload) => (
                <div key={upload.id} className="file-item">
                  <div>
                    <strong>{upload.name}</strong>
                    <small>{formatBytes(upload.size)}</small>
                  </div>
                  <button
                    type="button"
                    onClick={() => setSession(removeUpload(session, upload.id))}
                    disabled={busy}
                  >
                    Remove
                  </button>
                </div>
              ))
            )}
          </div>

          {rejectedUploads.map((message, index) => (
            <p key={`${index}-${message}`} className="alert error">
              {message}
            </p>
          ))}
          {failuresFor(session, ["render"]).map((failure) => (
            <p key={failure.id} className="alert error">
              {failure.message}
            </p>
          ))}

          <details>
            <summary>PDF rendering</summary>
            <div className="split">
              <label className="field">
                <span>Scale</span>
                <input
                  type="number"
                  min={0.5}
                  max={4}
                  step={0.25}
                  value={renderSettings.scale}
                  onChange={(event) => updateRenderSetting("scale", event.target.value)}
                  disabled={busy}
                />
              </label>
              <label className="field">
                <span>Longest side (px)</span>
                <input
                  type="number"
                  min={512}
                  max={4096}
                  step={64}
                  value={renderSettings.maxDimension}
                  onChange={(event) =>
                    updateRenderSetting("maxDimension", event.target.value)
                  }
                  disabled={busy}
                />
              </label>
            </div>
            <p className="muted">Applies to PDFs added after the change.</p>
          </details>

          <div className="inline-actions">
            <button type="button" onClick={handleReset} disabled={busy}>
              New Session
            </button>
          </div>
        </section>

        <section className="panel full-width">
          <h2>3) Pages to Read</h2>
          <PageGallery
            images={session.images}
            selectedImageIds={session.selectedImageIds}
            failures={failuresFor(session, ["extract"])}
            disabled={busy}
            onToggle={(imageId) => setSession(toggleImageSelection(session, imageId))}
            onSelectAll={() => setSession(selectAllImages(session))}
            onClear={() => setSession(setImageSelection(session, []))}
          />
          <div className="inline-actions">
            <button
              type="button"
              className="primary"
              onClick={() => void handleExtract()}
              disabled={busy || session.selectedImageIds.length === 0}
            >
              {activity === "extracting" ? "Extracting..." : "Extract Menu Items"}
            </button>
          </div>
          {progress && (
            <div className="progress-panel">
              <progress max={100} value={percent} />
              <p>
                {progress.completedImages}/{progress.totalImages} image(s) ({percent}%)
                {progress.currentImage && ` · reading ${progress.currentImage}`}
              </p>
            </div>
          )}
        </section>

        <section className="panel full-width">
          <h2>4) Menu Items</h2>
          {flaggedCount > 0 && (
            <p className="alert warning">{flaggedCount} item(s) need review.</p>
          )}
          {failuresFor(session, ["edit", "import"]).map((failure) => (
            <p key={failure.id} className="alert warning">
              {failure.message}
            </p>
          ))}
          <MenuItemsTable
            items={session.items}
            disabled={busy}
            onEdit={handleEdit}
            onRemove={(itemId) => setSession(removeMenuItem(session, itemId))}
          />
          {rawOutputs.length > 0 && (
            <details>
              <summary>View raw model output</summary>
              {rawOutputs.map((output) => (
                <div key={output.imageLabel} className="raw-output">
                  <strong>{output.imageLabel}</strong>
                  <pre>{output.text}</pre>
                </div>
              ))}
            </details>
          )}
        </section>

        <section className="panel">
          <h2>5) Download</h2>
          <p className="muted">
            CSV and XLSX repeat <code>price_label_N</code> and <code>price_N</code>{" "}
            columns for items with several prices.
          </p>
          <div className="inline-actions">
            {EXPORT_FORMATS.map((format) => (
              <button
                key={format}
                type="button"
                onClick={() => handleExport(format)}
                disabled={session.items.length === 0}
              >
                {format.toUpperCase()}
              </button>
            ))}
          </div>
          <div className="inline-actions">
            <button
              type="button"
              onClick={() => importInputRef.current?.click()}
              disabled={busy}
            >
              Load Saved JSON/CSV
            </button>
            <input
              ref={importInputRef}
              type="file"
              accept=".json,.csv,application/json,text/csv"
              hidden
              onChange={(event) => {
                void handleImport(event.target.files);
                event.currentTarget.value = "";
              }}
            />
          </div>
        </section>

        <section className="panel">
          <h2>6) Extraction Prompt</h2>
          <textarea
            aria-label="Extraction prompt"
            value={promptConfig.menuSystem}
            onChange={(event) => setPromptConfig({ menuSystem: event.target.value })}
            rows={10}
            disabled={busy}
          />
          <div className="inline-actions">
            <button
              type="button"
              onClick={() => promptInputRef.current?.click()}
              disabled={busy}
            >
              Import .md
            </button>
            <button type="button" onClick={handlePromptExport} disabled={busy}>
              Export .md
            </button>
            <button
              type="button"
              onClick={() => setPromptConfig(DEFAULT_PROMPT_CONFIG)}
              disabled={busy}
            >
              Restore Default
            </button>
            <input
              ref={promptInputRef}
              type="file"
              accept=".md,text/markdown,text/plain"
              hidden
              onChange={(event) => {
                void handlePromptImport(event.target.files);
                event.currentTarget.value = "";
              }}
            />
          </div>
        </section>

        <section className="panel full-width">
          <h2>Status Log</h2>
          <div className="log-panel">
            {logs.length === 0 ? (
              <p className="muted">Nothing has happened yet.</p>
            ) : (
              logs.map((entry) => (
                <div key={entry.id} className={`log-entry ${entry.level}`}>
                  <span>{entry.timestamp}</span>
                  <span>{entry.level}</span>
                  <span>{entry.message}</span>
                </div>
              ))
            )}
          </div>
        </section>
      </main>
    </div>
  );
}
