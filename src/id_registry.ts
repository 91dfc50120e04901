// src/id_registry.ts

import { v4 as uuidv4 } from "uuid";
import { EnumStore } from "./enum_store";
import {
  CapacityExceededError,
  DuplicateRegistrationError,
  InvalidConfigError,
  InvalidNameError,
  OwnershipConflictError,
  StaleHandleError,
} from "./errors";
import { ComponentHealth, HealthCheckable, HealthStatus, combineHealthStatus } from "./health";
import { IdHandle } from "./id_handle";
import { MAX_IDS } from "./limits";
import { createLogger, Logger } from "./logger";
import { CALLER_DEPTH, NO_OWNER, Owner, OwnerResolver, formatOwner, sameOwner } from "./owner";

/** Share of the id space above which the registry reports itself degraded. */
const DEGRADED_USAGE = 0.9;

export interface IdRegistryOptions {
  store: EnumStore;
  /** Defaults to {@link MAX_IDS}; may only lower it. */
  maxIds?: number;
  /** Consulted when `register` is called without an explicit owner. */
  resolveOwner?: OwnerResolver;
}

export interface RegisterOptions {
  /** Registering component; `null` registers without an owner. */
  owner?: Owner | null;
  /** Reject a live name held by another owner. Defaults to true. */
  checkOwner?: boolean;
  /** Fail instead of returning an already live handle. */
  exclusive?: boolean;
}

export interface OwnerCheck {
  owner: Owner | null;
}

/**
 * Who registered a live handle, and where.
 */
export interface RegistrationRecord {
  registrationId: string;
  owner: Owner | null;
  registeredAt: Date;
  /** Captured at registration; its stack points at the registering code. */
  trace: Error;
}

/**
 * Assigns dense, durable integer ids to names.
 *
 * The name→id map mirrors the enum store and only grows; the live table maps
 * ids to handles and is the only part `unregister` touches. Every method runs
 * synchronously, so allocation, the store rewrite and the table updates of one
 * call are never interleaved with another call.
 */
export class IdRegistry implements HealthCheckable {
  readonly maxIds: number;
  private readonly store: EnumStore;
  private readonly resolveOwner?: OwnerResolver;
  private readonly nameToId: Map<string, number>;
  private readonly live = new Map<number, IdHandle>();
  private readonly records = new Map<number, RegistrationRecord>();
  private readonly log: Logger;

  constructor(options: IdRegistryOptions) {
    const maxIds = options.maxIds ?? MAX_IDS;
    if (!Number.isInteger(maxIds) || maxIds < 1 || maxIds > MAX_IDS) {
      throw new InvalidConfigError(`maxIds must be an integer in [1, ${MAX_IDS}], got ${maxIds}`);
    }

    this.maxIds = maxIds;
    this.store = options.store;
    this.resolveOwner = options.resolveOwner;
    this.log = createLogger("IdRegistry", options.store.location);
    this.nameToId = this.store.load();
    this.log.info(`Registry initialized with ${this.nameToId.size} persisted names`);
  }

  /** Number of live handles. */
  get size(): number {
    return this.live.size;
  }

  /** Number of names recorded in the store, live or not. */
  get persistedCount(): number {
    return this.nameToId.size;
  }

  /**
   * Returns the handle for `name`, allocating and persisting an id the first
   * time the name is seen. Repeated calls return the same handle.
   */
  register(name: string, options: RegisterOptions = {}): IdHandle {
    validateName(name);
    const owner = options.owner !== undefined ? options.owner : this.callerOwner();

    const existing = this.liveHandle(name);
    if (existing) {
      if (options.exclusive) {
        throw new DuplicateRegistrationError(name, existing.id);
      }
      if (options.checkOwner ?? true) {
        this.assertOwner(existing, owner);
      }
      return existing;
    }

    const handle = new IdHandle(name, this.idFor(name));
    this.bind(handle, owner);
    return handle;
  }

  /**
   * Looks up the live handle for `name` without allocating. With `check`, a
   * live handle recorded under a different owner raises
   * {@link OwnershipConflictError}.
   */
  findByName(name: string, check?: OwnerCheck): IdHandle | undefined {
    const handle = this.liveHandle(name);
    if (handle && check) {
      this.assertOwner(handle, check.owner);
    }
    return handle;
  }

  findById(id: number): IdHandle | undefined {
    return this.live.get(id);
  }

  /** Id recorded for `name` in the store, whether or not it is live. */
  getPersistedId(name: string): number | undefined {
    return this.nameToId.get(name);
  }

  getOwner(handle: IdHandle): Owner | null | undefined {
    if (this.live.get(handle.id) !== handle) {
      return undefined;
    }
    return this.records.get(handle.id)?.owner ?? null;
  }

  getRegistration(handle: IdHandle): RegistrationRecord | undefined {
    return this.live.get(handle.id) === handle ? this.records.get(handle.id) : undefined;
  }

  /**
   * Drops a live handle. Its id stays reserved for the same name.
   */
  unregister(handle: IdHandle): void {
    if (this.live.get(handle.id) !== handle) {
      throw new StaleHandleError(handle.name, handle.id);
    }
    this.live.delete(handle.id);
    this.records.delete(handle.id);
    this.log.child({ name: handle.name, id: handle.id }).debug("Unregistered");
  }

  dump(): string {
    const lines = [
      `ID registry: ${this.live.size} live, ${this.nameToId.size} persisted (${this.store.location})`,
    ];
    const ids = [...this.live.keys()].sort((a, b) => a - b);
    for (const id of ids) {
      const handle = this.live.get(id);
      const record = this.records.get(id);
      if (!handle || !record) continue;
      lines.push(
        `  ${id} ${handle.name} owner=${formatOwner(record.owner)} registration=${record.registrationId} at=${record.registeredAt.toISOString()}`,
      );
    }

    const text = lines.join("\n");
    this.log.info(text);
    return text;
  }

  /** Rewrites the store from the in-memory name→id map. */
  reinitializeDiskStorage(): void {
    this.store.rewrite(this.nameToId);
    this.log.info(`Rewrote enum store with ${this.nameToId.size} names`);
  }

  getHealth(): ComponentHealth {
    const used = this.nameToId.size;
    const statuses: HealthStatus[] = [];
    const notes: string[] = [];

    if (used >= this.maxIds) {
      statuses.push("unhealthy");
      notes.push("id space exhausted");
    } else if (used >= this.maxIds * DEGRADED_USAGE) {
      statuses.push("degraded");
      notes.push(`id space ${Math.floor((used / this.maxIds) * 100)}% used`);
    }
    if (this.store.recovered) {
      statuses.push("degraded");
      notes.push("enum store was reset on load");
    }

    return {
      name: "IdRegistry",
      status: combineHealthStatus(statuses),
      message: notes.length > 0 ? notes.join("; ") : undefined,
      details: {
        live: this.live.size,
        persisted: used,
        maxIds: this.maxIds,
        store: this.store.location,
      },
    };
  }

  private liveHandle(name: string): IdHandle | undefined {
    const id = this.nameToId.get(name);
    return id === undefined ? undefined : this.live.get(id);
  }

  private callerOwner(): Owner | null {
    return this.resolveOwner?.(CALLER_DEPTH) ?? NO_OWNER;
  }

  private assertOwner(handle: IdHandle, required: Owner | null): void {
    const record = this.records.get(handle.id);
    const actual = record?.owner ?? null;
    if (sameOwner(actual, required)) {
      return;
    }

    const error = new OwnershipConflictError(handle.name, required, actual, record?.trace);
    this.log.error(error.message, record?.trace, {
      name: handle.name,
      id: handle.id,
      owner: formatOwner(required),
    });
    throw error;
  }

  private idFor(name: string): number {
    const known = this.nameToId.get(name);
    if (known !== undefined) {
      return known;
    }

    const id = this.nameToId.size + 1;
    if (id > this.maxIds) {
      throw new CapacityExceededError(name, id, this.maxIds);
    }

    const log = this.log.child({ name, id });
    this.nameToId.set(name, id);
    try {
      this.store.rewrite(this.nameToId);
    } catch (err) {
      this.nameToId.delete(name);
      log.error("Failed to persist new id", err instanceof Error ? err : undefined);
      throw err;
    }

    log.debug("Allocated id");
    return id;
  }

  private bind(handle: IdHandle, owner: Owner | null): void {
    if (this.live.has(handle.id)) {
      throw new DuplicateRegistrationError(handle.name, handle.id);
    }
    this.live.set(handle.id, handle);
    this.records.set(handle.id, {
      registrationId: uuidv4(),
      owner,
      registeredAt: new Date(),
      trace: new Error(`Registration of '${handle.name}'`),
    });
  }
}

function validateName(name: string): void {
  if (name.length === 0) {
    throw new InvalidNameError(name, "name is empty");
  }
  if (/[\r\n]/.test(name)) {
    throw new InvalidNameError(name, "name contains a line break");
  }
  // A lone surrogate is written as U+FFFD and would not match on reload.
  if (/[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/.test(name)) {
    throw new InvalidNameError(name, "name is not well-formed UTF-16");
  }
}
