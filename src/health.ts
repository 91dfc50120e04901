// src/health.ts

/**
 * Health status of a component.
 */
export type HealthStatus = "healthy" | "degraded" | "unhealthy";

/**
 * Health check result for a single component.
 */
export interface ComponentHealth {
  /** Name of the component */
  name: string;
  status: HealthStatus;
  /** Optional message providing details */
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Interface for components that support health checks.
 */
export interface HealthCheckable {
  getHealth(): ComponentHealth;
}

/**
 * Combines multiple health statuses, returning the worst one.
 * Priority: unhealthy > degraded > healthy
 */
export function combineHealthStatus(statuses: HealthStatus[]): HealthStatus {
  if (statuses.includes("unhealthy")) return "unhealthy";
  if (statuses.includes("degraded")) return "degraded";
  return "healthy";
}
