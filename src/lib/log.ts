import type { LogEntry, LogLevel } from "../types";

export type LogSink = (level: LogLevel, message: string) => void;

export function createId(): string {
  return typeof crypto !== "undefined" && "randomUUID" in crypto
    ? crypto.randomUUID()
    : `${Date.now()}-${Math.random()}`;
}

export function createLog(
  level: LogLevel,
  message: string,
  now: Date = new Date(),
): LogEntry {
  return {
    id: createId(),
    level,
    message,
    timestamp: now.toLocaleTimeString(),
  };
}
