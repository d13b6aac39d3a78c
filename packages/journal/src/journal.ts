import { createHash } from "node:crypto";
import { appendFile, readFile, mkdir, writeFile, rename, open, unlink } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import type { JournalEvent, JournalEventType } from "@townsim/schemas";
import { validateJournalEventData } from "@townsim/schemas";

export interface JournalOptions {
  fsync?: boolean;
  /** If true, acquire an advisory lockfile so a second process cannot interleave writes. Default: true */
  lock?: boolean;
  /** How to handle a broken hash chain on init. "truncate" (default) keeps the valid prefix; "strict" throws. */
  recovery?: "truncate" | "strict";
}

export type JournalListener = (event: JournalEvent) => void;

/**
 * Append-only JSONL record of agent lifecycle events. Each line carries the
 * sha256 of the previous line, so tampering or partial writes are detectable.
 */
export class Journal {
  private filePath: string;
  private lastHash: string | undefined;
  private listeners: JournalListener[] = [];
  private writeLock: Promise<void> = Promise.resolve();
  private agentIndex = new Map<string, JournalEvent[]>();
  private nextSeq = 0;
  private fsync: boolean;
  private lockEnabled: boolean;
  private lockPath: string;
  private locked = false;
  private recovery: "truncate" | "strict";

  constructor(filePath: string, options?: JournalOptions) {
    this.filePath = filePath;
    this.fsync = options?.fsync ?? true;
    this.lockEnabled = options?.lock ?? true;
    this.lockPath = `${filePath}.lock`;
    this.recovery = options?.recovery ?? "truncate";
  }

  async init(): Promise<void> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    if (this.lockEnabled) {
      await this.acquireLock();
    }
    if (!existsSync(this.filePath)) return;

    const content = await readFile(this.filePath, "utf-8");
    const lines = content.trim().split("\n").filter(Boolean);

    // A crash mid-append leaves an incomplete last line
    const last = lines[lines.length - 1];
    if (last !== undefined) {
      try { JSON.parse(last); }
      catch {
        lines.pop();
        await writeFile(this.filePath, lines.length > 0 ? lines.join("\n") + "\n" : "", "utf-8");
        console.error(`Journal: truncated incomplete last line from crash`);
      }
    }

    let maxSeq = -1;
    let prevHash: string | undefined;
    const tempIndex = new Map<string, JournalEvent[]>();
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      const event = JSON.parse(line) as JournalEvent;
      if (i > 0 && event.hash_prev !== prevHash) {
        if (this.recovery === "strict") {
          throw new Error(`Journal integrity violation at event ${i} (seq=${event.seq}): hash chain broken`);
        }
        console.error(`Journal: recovered from corruption at event ${i}, truncated ${lines.length - i} events`);
        const tmpPath = `${this.filePath}.tmp`;
        const validLines = lines.slice(0, i);
        await writeFile(tmpPath, validLines.length > 0 ? validLines.join("\n") + "\n" : "", "utf-8");
        await rename(tmpPath, this.filePath);
        break;
      }
      prevHash = this.hash(line);
      const bucket = tempIndex.get(event.agent);
      if (bucket) bucket.push(event);
      else tempIndex.set(event.agent, [event]);
      if (event.seq !== undefined && event.seq > maxSeq) maxSeq = event.seq;
    }

    this.agentIndex = tempIndex;
    this.nextSeq = maxSeq + 1;
    this.lastHash = prevHash;
  }

  on(listener: JournalListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  async emit(
    agent: string,
    type: JournalEventType,
    payload: Record<string, unknown>
  ): Promise<JournalEvent> {
    let releaseLock: () => void = () => {};
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      const seq = this.nextSeq;
      const event: JournalEvent = {
        event_id: uuid(),
        timestamp: new Date().toISOString(),
        agent,
        type,
        payload,
        ...(this.lastHash !== undefined ? { hash_prev: this.lastHash } : {}),
        seq,
      };

      const validation = validateJournalEventData(event);
      if (!validation.valid) {
        throw new Error(`Invalid journal event: ${validation.errors.join(", ")}`);
      }

      const line = JSON.stringify(event);
      const lineHash = this.hash(line);

      if (this.fsync) {
        const fh = await open(this.filePath, "a");
        try {
          await fh.write(line + "\n", undefined, "utf-8");
          await fh.sync();
        } finally {
          await fh.close();
        }
      } else {
        await appendFile(this.filePath, line + "\n", "utf-8");
      }

      // Only update in-memory state after a successful write
      this.nextSeq = seq + 1;
      this.lastHash = lineHash;
      const bucket = this.agentIndex.get(agent);
      if (bucket) bucket.push(event);
      else this.agentIndex.set(agent, [event]);

      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          console.error(`Journal: listener failed on ${event.type}: ${err instanceof Error ? err.message : String(err)}`);
        }
      }

      return event;
    } finally {
      releaseLock();
    }
  }

  /** Like emit, but reports a failed write instead of throwing. Used on error paths. */
  async tryEmit(
    agent: string,
    type: JournalEventType,
    payload: Record<string, unknown>
  ): Promise<JournalEvent | null> {
    try {
      return await this.emit(agent, type, payload);
    } catch (err) {
      console.error(`Journal: failed to record ${type} for ${agent}: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }

  async readAll(options?: { limit?: number }): Promise<JournalEvent[]> {
    if (!existsSync(this.filePath)) return [];
    const content = await readFile(this.filePath, "utf-8");
    const events = content.trim().split("\n").filter(Boolean)
      .map((line) => JSON.parse(line) as JournalEvent);
    if (options?.limit !== undefined && options.limit < events.length) {
      return events.slice(events.length - options.limit);
    }
    return events;
  }

  readAgent(agent: string, options?: { offset?: number; limit?: number }): JournalEvent[] {
    const events = this.agentIndex.get(agent) ?? [];
    if (!options) return [...events];
    const start = options.offset ?? 0;
    const end = options.limit !== undefined ? start + options.limit : undefined;
    return events.slice(start, end);
  }

  async verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: number }> {
    const events = await this.readAll();
    let prevHash: string | undefined;
    for (let i = 0; i < events.length; i++) {
      const event = events[i];
      if (!event) continue;
      if (i > 0 && event.hash_prev !== prevHash) {
        return { valid: false, brokenAt: i };
      }
      prevHash = this.hash(JSON.stringify(event));
    }
    return { valid: true };
  }

  /** Wait for pending writes and release the lockfile. */
  async close(): Promise<void> {
    await this.writeLock;
    if (this.lockEnabled && this.locked) {
      await this.releaseLock();
    }
  }

  private hash(data: string): string {
    return createHash("sha256").update(data).digest("hex");
  }

  private async acquireLock(): Promise<void> {
    try {
      const fh = await open(this.lockPath, "wx");
      await fh.write(String(process.pid), undefined, "utf-8");
      await fh.close();
      this.locked = true;
    } catch (err: unknown) {
      if (!isErrno(err, "EEXIST")) throw err;

      let pid = NaN;
      try {
        pid = parseInt((await readFile(this.lockPath, "utf-8")).trim(), 10);
      } catch (readErr) {
        if (!isErrno(readErr, "ENOENT")) throw readErr;
      }
      if (isNaN(pid)) {
        await this.removeStaleLock();
        return this.acquireLock();
      }

      try {
        process.kill(pid, 0);
      } catch (killErr: unknown) {
        if (isErrno(killErr, "ESRCH")) {
          await this.removeStaleLock();
          return this.acquireLock();
        }
        throw killErr;
      }
      throw new Error(`Journal is locked by process ${pid} (lockfile: ${this.lockPath})`);
    }
  }

  private async releaseLock(): Promise<void> {
    await this.removeStaleLock();
    this.locked = false;
  }

  private async removeStaleLock(): Promise<void> {
    try {
      await unlink(this.lockPath);
    } catch (err) {
      if (!isErrno(err, "ENOENT")) throw err;
    }
  }
}

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
