// src/owner.ts

/**
 * Identity of the component that registered a name, e.g. a plugin id.
 * `null` (see {@link NO_OWNER}) means the name was registered without one.
 */
export type Owner = string;

export const NO_OWNER = null;

/**
 * Answers "who is registering" for a given call-stack depth.
 * Consulted only when `register` is called without an explicit owner.
 */
export type OwnerResolver = (callDepth: number) => Owner | null | undefined;

/** Frames between the registry's resolver call and the registering code. */
export const CALLER_DEPTH = 2;

export function sameOwner(a: Owner | null, b: Owner | null): boolean {
  return a === b;
}

export function formatOwner(owner: Owner | null): string {
  return owner ?? "<none>";
}
