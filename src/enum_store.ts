// src/enum_store.ts

import * as fs from "fs";
import * as path from "path";
import { PersistenceError } from "./errors";
import { MAX_IDS } from "./limits";
import { createLogger, Logger } from "./logger";

export const DEFAULT_ENUM_FILE_NAME = "indices.enum";

/**
 * Durable name list: line `i` (0-based) of the store holds the name whose id
 * is `i + 1`.
 */
export interface EnumStore {
  /** Path or label of the backing storage, for diagnostics. */
  readonly location: string;

  /** True when the last {@link load} found the store missing or corrupt. */
  readonly recovered: boolean;

  /**
   * Reads the name→id map. A missing or corrupt store is reset to empty and
   * an empty map is returned; this never throws for those cases.
   */
  load(): Map<string, number>;

  /**
   * Replaces the whole store with `names`, whose ids must be exactly
   * `1..names.size`. Throws {@link PersistenceError} when nothing was written.
   */
  rewrite(names: ReadonlyMap<string, number>): void;
}

export type ParseResult =
  | { ok: true; names: string[] }
  | { ok: false; problem: string };

/**
 * Decodes store bytes into the ordered name list.
 */
export function parseEnumStore(bytes: Uint8Array): ParseResult {
  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    return { ok: false, problem: "contents are not valid UTF-8" };
  }

  if (text.length === 0) {
    return { ok: true, names: [] };
  }

  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }

  if (lines.length > MAX_IDS) {
    return { ok: false, problem: `${lines.length} names exceed the ${MAX_IDS} id limit` };
  }

  const seen = new Set<string>();
  for (let i = 0; i < lines.length; i++) {
    const name = lines[i];
    if (name.length === 0) {
      return { ok: false, problem: `line ${i + 1} is blank` };
    }
    if (seen.has(name)) {
      return { ok: false, problem: `line ${i + 1} repeats '${name}'` };
    }
    seen.add(name);
  }
  return { ok: true, names: lines };
}

/**
 * Renders a name→id map as store text. Returns undefined when the ids are not
 * a dense `1..size` range.
 */
export function serializeEnumStore(names: ReadonlyMap<string, number>): string | undefined {
  const lines = new Array<string | undefined>(names.size);
  for (const [name, id] of names) {
    if (!Number.isInteger(id) || id < 1 || id > names.size || lines[id - 1] !== undefined) {
      return undefined;
    }
    lines[id - 1] = name;
  }
  return lines.map((line) => `${line}\n`).join("");
}

/**
 * Shared load/rewrite logic; subclasses only move bytes.
 */
abstract class BaseEnumStore implements EnumStore {
  private _recovered = false;
  protected readonly log: Logger;

  constructor(readonly location: string) {
    this.log = createLogger("EnumStore", location);
  }

  get recovered(): boolean {
    return this._recovered;
  }

  /** Returns undefined when there is no store yet. */
  protected abstract readBytes(): Uint8Array | undefined;

  protected abstract writeBytes(text: string): void;

  load(): Map<string, number> {
    let bytes: Uint8Array | undefined;
    try {
      bytes = this.readBytes();
    } catch (err) {
      return this.reset(`store could not be read: ${errorMessage(err)}`);
    }
    if (bytes === undefined) {
      return this.reset("store is missing");
    }

    const parsed = parseEnumStore(bytes);
    if (!parsed.ok) {
      return this.reset(`store is corrupt: ${parsed.problem}`);
    }

    this._recovered = false;
    const result = new Map<string, number>();
    parsed.names.forEach((name, index) => result.set(name, index + 1));
    this.log.debug(`Loaded ${result.size} names`);
    return result;
  }

  rewrite(names: ReadonlyMap<string, number>): void {
    const text = serializeEnumStore(names);
    if (text === undefined) {
      throw new PersistenceError(
        `Refusing to write enum store ${this.location}: ids are not dense`,
        this.location,
      );
    }

    try {
      this.writeBytes(text);
    } catch (err) {
      throw new PersistenceError(
        `Failed to write enum store ${this.location}`,
        this.location,
        err instanceof Error ? err : new Error(String(err)),
      );
    }
  }

  private reset(reason: string): Map<string, number> {
    this._recovered = true;
    this.log.warn(`Resetting enum store to empty: ${reason}`);
    try {
      this.rewrite(new Map());
    } catch (err) {
      // The next allocation retries the write and reports the failure.
      this.log.error("Could not reset enum store", err instanceof Error ? err : undefined);
    }
    return new Map();
  }
}

/**
 * Enum store kept in a plain text file under the index root.
 */
export class FileEnumStore extends BaseEnumStore {
  constructor(indexRoot: string, fileName: string = DEFAULT_ENUM_FILE_NAME) {
    super(path.resolve(indexRoot, fileName));
  }

  protected readBytes(): Uint8Array | undefined {
    if (!fs.existsSync(this.location)) {
      return undefined;
    }
    return fs.readFileSync(this.location);
  }

  protected writeBytes(text: string): void {
    fs.mkdirSync(path.dirname(this.location), { recursive: true });
    const temp = `${this.location}.tmp`;
    try {
      fs.writeFileSync(temp, text, "utf8");
      fs.renameSync(temp, this.location);
    } catch (err) {
      fs.rmSync(temp, { force: true });
      throw err;
    }
  }
}

/**
 * Enum store held in memory. Survives registry instances, so a second
 * registry over the same store behaves like a process restart.
 */
export class InMemoryEnumStore extends BaseEnumStore {
  private contents: Uint8Array | undefined;
  private pendingFailure: Error | undefined;
  private _writeCount = 0;

  constructor(initialNames?: readonly string[], label = "default") {
    super(`memory:${label}`);
    if (initialNames !== undefined) {
      this.contents = Buffer.from(initialNames.map((name) => `${name}\n`).join(""), "utf8");
    }
  }

  get writeCount(): number {
    return this._writeCount;
  }

  /** Replaces the raw contents; undefined makes the store missing. */
  setContents(bytes: Uint8Array | string | undefined): void {
    this.contents = typeof bytes === "string" ? Buffer.from(bytes, "utf8") : bytes;
  }

  readContents(): string | undefined {
    return this.contents === undefined ? undefined : Buffer.from(this.contents).toString("utf8");
  }

  /** Makes the next write throw `error`. */
  failNextWrite(error: Error = new Error("simulated write failure")): void {
    this.pendingFailure = error;
  }

  protected readBytes(): Uint8Array | undefined {
    return this.contents;
  }

  protected writeBytes(text: string): void {
    if (this.pendingFailure) {
      const error = this.pendingFailure;
      this.pendingFailure = undefined;
      throw error;
    }
    this.contents = Buffer.from(text, "utf8");
    this._writeCount++;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
