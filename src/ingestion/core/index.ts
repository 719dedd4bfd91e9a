/**
 * Ingestion Core
 *
 * Re-exports all core types and utilities for the ingestion pipeline.
 */

export * from "./boundary";
export * from "./errors";
export * from "./interval-fetcher";
export * from "./intervals";
export * from "./normalize";
export * from "./orchestrator";
export * from "./persist";
export * from "./rate-limit";
export * from "./run-stats";
export * from "./signature";
export * from "./sql";
export * from "./types";
