/**
 * Session store
 * One JSON document per session id holding the variables produced by
 * earlier runs. Writes merge into the stored record, never replace it.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { resolveInside, validatePathLength } from "../utils/pathSecurity";
import { SessionRecord } from "../types";

export interface SessionStore {
  /** Stored variables, or an empty record when nothing was saved yet */
  load(sessionId: string): Promise<SessionRecord>;
  /** Merge `variables` into the stored record and return the merged record */
  save(sessionId: string, variables: SessionRecord): Promise<SessionRecord>;
  /** @returns whether a record existed */
  clear(sessionId: string): Promise<boolean>;
  list(): Promise<string[]>;
}

export interface FileSessionStoreConfig {
  stateDir: string;
}

function isMissingFile(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}

function isSessionRecord(value: unknown): value is SessionRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class FileSessionStore implements SessionStore {
  private stateDir: string;

  constructor(config: FileSessionStoreConfig) {
    this.stateDir = path.resolve(config.stateDir);
  }

  async load(sessionId: string): Promise<SessionRecord> {
    let raw: string;
    try {
      raw = await fs.readFile(this.recordPath(sessionId), "utf-8");
    } catch (e) {
      if (isMissingFile(e)) return {};
      throw e;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isSessionRecord(parsed)) {
      throw new Error(`Session record for "${sessionId}" is not a JSON object`);
    }
    return parsed;
  }

  async save(sessionId: string, variables: SessionRecord): Promise<SessionRecord> {
    const existing = await this.load(sessionId);
    const merged = { ...existing, ...variables };

    await fs.mkdir(this.stateDir, { recursive: true });
    await fs.writeFile(this.recordPath(sessionId), JSON.stringify(merged, null, 2), "utf-8");
    return merged;
  }

  async clear(sessionId: string): Promise<boolean> {
    try {
      await fs.unlink(this.recordPath(sessionId));
      return true;
    } catch (e) {
      if (isMissingFile(e)) return false;
      throw e;
    }
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.stateDir);
    } catch (e) {
      if (isMissingFile(e)) return [];
      throw e;
    }
    return entries
      .filter((name) => name.endsWith(".json"))
      .map((name) => name.slice(0, -".json".length))
      .sort();
  }

  private recordPath(sessionId: string): string {
    validatePathLength(sessionId);
    return resolveInside(this.stateDir, `${sessionId}.json`);
  }
}

/**
 * In-process store, used by tests and embedders that persist elsewhere
 */
export class MemorySessionStore implements SessionStore {
  private records: Map<string, SessionRecord> = new Map();

  async load(sessionId: string): Promise<SessionRecord> {
    return structuredClone(this.records.get(sessionId) ?? {});
  }

  async save(sessionId: string, variables: SessionRecord): Promise<SessionRecord> {
    const merged = { ...this.records.get(sessionId), ...structuredClone(variables) };
    this.records.set(sessionId, merged);
    return structuredClone(merged);
  }

  async clear(sessionId: string): Promise<boolean> {
    return this.records.delete(sessionId);
  }

  async list(): Promise<string[]> {
    return [...this.records.keys()].sort();
  }
}
