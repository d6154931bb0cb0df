import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";

import type { RunEventPayloads, RunEventType, SerializedError } from "./run_events";

export type RunLogEvent = {
  ts: string;
  run_id: string;
  type: RunEventType;
  duration_ms?: number;
  [key: string]: unknown;
};

export type RunLoggerOptions = {
  run_id?: string;
  log_dir?: string;
  // when false, events are kept in memory only
  persist?: boolean;
};

/**
 * JSONL trail of one report run. Every event is kept in `events`; persisting
 * loggers also append it to `<log_dir>/<run_id>.jsonl`.
 */
export class RunLogger {
  readonly run_id: string;
  readonly log_path: string;
  readonly persist: boolean;
  readonly events: RunLogEvent[] = [];

  constructor(options: RunLoggerOptions = {}) {
    this.run_id = options.run_id ?? crypto.randomUUID();
    this.log_path = path.resolve(options.log_dir ?? "runs", `${this.run_id}.jsonl`);
    this.persist = options.persist ?? true;
  }

  logEvent<T extends RunEventType>(type: T, payload: RunEventPayloads[T]): RunLogEvent {
    return this.append(type, payload);
  }

  startTimer() {
    const start = Date.now();
    return () => Date.now() - start;
  }

  logDuration<T extends RunEventType>(
    type: T,
    startMs: number,
    payload: Omit<RunEventPayloads[T], "duration_ms">
  ): RunLogEvent {
    return this.append(type, { ...payload, duration_ms: Date.now() - startMs });
  }

  private append(type: RunEventType, payload: Record<string, unknown>): RunLogEvent {
    const record: RunLogEvent = {
      ...payload,
      ts: new Date().toISOString(),
      run_id: this.run_id,
      type,
    };
    this.events.push(record);
    if (this.persist) {
      fs.mkdirSync(path.dirname(this.log_path), { recursive: true });
      fs.appendFileSync(this.log_path, `${JSON.stringify(record)}\n`);
    }
    return record;
  }

  static serializeError(error: unknown): SerializedError {
    if (error instanceof Error) {
      return {
        name: error.name,
        message: error.message,
        stack: error.stack,
        cause: error.cause,
      };
    }
    return { name: "Error", message: String(error) };
  }
}
