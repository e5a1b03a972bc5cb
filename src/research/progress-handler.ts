import { BaseCallbackHandler } from "@langchain/core/callbacks/base";
import * as fs from "fs";

export interface ProgressEvent {
  timestamp: string;
  eventName: string;
  runId: string;
  data: unknown;
}

export interface ProgressHandlerOptions {
  /** Append every event as one JSON line to this file. */
  logFilePath?: string;
  /** Print a short line per event. Defaults to true. */
  print?: boolean;
  onEvent?: (event: ProgressEvent) => void;
}

function describe(data: unknown): string {
  if (typeof data !== "object" || data === null) return "";
  const parts: string[] = [];
  for (const [key, value] of Object.entries(data)) {
    if (key === "reads" || key === "fields") continue;
    parts.push(`${key}=${typeof value === "string" ? value : JSON.stringify(value)}`);
  }
  return parts.join(" ");
}

/**
 * ResearchProgressHandler - picks up the custom events the stages and router
 * dispatch (stage_started, stage_completed, stage_failed, route_decided)
 */
export class ResearchProgressHandler extends BaseCallbackHandler {
  name = "research_progress_handler" as const;

  private logStream?: fs.WriteStream;
  private readonly print: boolean;
  private readonly onEvent?: (event: ProgressEvent) => void;

  constructor(options: ProgressHandlerOptions = {}) {
    super();
    this.print = options.print ?? true;
    this.onEvent = options.onEvent;
    if (options.logFilePath) {
      this.logStream = fs.createWriteStream(options.logFilePath, { flags: "a" });
    }
  }

  async handleCustomEvent(eventName: string, data: unknown, runId: string): Promise<void> {
    const event: ProgressEvent = { timestamp: new Date().toISOString(), eventName, runId, data };

    this.logStream?.write(JSON.stringify(event) + "\n");
    if (this.print) {
      console.log(`📢 ${eventName} ${describe(data)}`);
    }
    this.onEvent?.(event);
  }

  close(): Promise<void> {
    const stream = this.logStream;
    this.logStream = undefined;
    if (!stream) return Promise.resolve();
    return new Promise((resolve) => stream.end(() => resolve()));
  }
}
