// src/errors.ts

/**
 * Base error class for all registry errors.
 */
export class IdRegistryError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "IdRegistryError";
  }
}

/**
 * Error thrown when allocating a new id would exceed the id space.
 */
export class CapacityExceededError extends IdRegistryError {
  constructor(name: string, requestedId: number, maxIds: number) {
    super(
      `Number of ids exceeded: ${requestedId} > ${maxIds} (while registering '${name}')`,
      "CAPACITY_EXCEEDED",
      { name, requestedId, maxIds },
    );
    this.name = "CapacityExceededError";
  }
}

/**
 * Error thrown when an exclusive registration finds a live handle for the name.
 */
export class DuplicateRegistrationError extends IdRegistryError {
  constructor(name: string, id: number) {
    super(`ID with name '${name}' is already registered (id ${id})`, "DUPLICATE_REGISTRATION", {
      name,
      id,
    });
    this.name = "DuplicateRegistrationError";
  }
}

/**
 * Error thrown when a name is requested by an owner other than the one that
 * registered it. `registrationTrace` points at the original registration.
 */
export class OwnershipConflictError extends IdRegistryError {
  readonly registrationTrace?: Error;

  constructor(
    name: string,
    requiredOwner: string | null,
    actualOwner: string | null,
    registrationTrace?: Error,
  ) {
    super(
      `ID with name '${name}' requested for owner ${requiredOwner} but registered for ${actualOwner}`,
      "OWNERSHIP_CONFLICT",
      { name, requiredOwner, actualOwner },
    );
    this.name = "OwnershipConflictError";
    this.registrationTrace = registrationTrace;
  }
}

/**
 * Error thrown when the enum store could not be written.
 */
export class PersistenceError extends IdRegistryError {
  readonly originalCause?: Error;

  constructor(message: string, location: string, cause?: Error) {
    super(message, "PERSISTENCE_FAILED", { location, cause: cause?.message });
    this.name = "PersistenceError";
    this.originalCause = cause;
  }
}

/**
 * Error thrown when unregistering a handle that is not the live one for its id.
 */
export class StaleHandleError extends IdRegistryError {
  constructor(name: string, id: number) {
    super(
      `Handle '${name}#${id}' is not the registered handle for id ${id}`,
      "STALE_HANDLE",
      { name, id },
    );
    this.name = "StaleHandleError";
  }
}

export class InvalidNameError extends IdRegistryError {
  constructor(name: string, reason: string) {
    super(`Invalid id name ${JSON.stringify(name)}: ${reason}`, "INVALID_NAME", {
      name,
      reason,
    });
    this.name = "InvalidNameError";
  }
}

export class InvalidConfigError extends IdRegistryError {
  constructor(message: string) {
    super(message, "INVALID_CONFIG");
    this.name = "InvalidConfigError";
  }
}
