// src/limits.ts

/** Largest id the registry hands out; also the most lines a store may hold. */
export const MAX_IDS = 32767;
