import { appendFile, mkdir } from "node:fs/promises";
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import { logger } from "./logger.js";

export interface AuditEventInput {
  eventType: string;
  actor: string;
  traceId?: string;
  requestId?: string;
  payload?: Record<string, unknown>;
}

export interface AuditEventRecord extends AuditEventInput {
  id: string;
  timestamp: string;
  traceId: string;
  requestId: string;
  payload: Record<string, unknown>;
}

export interface AuditSink {
  record(event: AuditEventInput): Promise<void>;
}

export class NoopAuditSink implements AuditSink {
  async record(): Promise<void> {
    return Promise.resolve();
  }
}

interface JsonlAuditSinkOptions {
  now?: () => Date;
}

/** One `<YYYY-MM-DD>.jsonl` file per day under `baseDir`, appended in call order. */
export class JsonlAuditSink implements AuditSink {
  private readonly now: () => Date;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(
    private readonly baseDir: string,
    options?: JsonlAuditSinkOptions
  ) {
    this.now = options?.now ?? (() => new Date());
  }

  async record(event: AuditEventInput): Promise<void> {
    const operation = this.writeQueue.then(async () => {
      const timestamp = this.now().toISOString();
      const filePath = join(this.baseDir, `${timestamp.slice(0, 10)}.jsonl`);
      const record: AuditEventRecord = {
        id: randomUUID(),
        timestamp,
        eventType: event.eventType,
        actor: event.actor,
        traceId: event.traceId ?? randomUUID(),
        requestId: event.requestId ?? randomUUID(),
        payload: event.payload ?? {}
      };

      try {
        await mkdir(this.baseDir, { recursive: true });
        await appendFile(filePath, `${JSON.stringify(record)}\n`, { encoding: "utf8" });
      } catch (error) {
        logger.error({ error, filePath }, "failed to append audit event");
      }
    });

    this.writeQueue = operation.catch(() => undefined);
    await operation;
  }
}
