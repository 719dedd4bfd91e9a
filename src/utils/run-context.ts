import { AsyncLocalStorage } from "node:async_hooks";

interface RunContext {
	runId: string;
	marketId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RunContext>();

/**
 * Run a function with ingestion run context.
 * This establishes the run ID for the entire async execution chain.
 */
export function runWithContext<T>(
	context: RunContext,
	fn: () => Promise<T>,
): Promise<T> {
	return asyncLocalStorage.run(context, fn);
}

/**
 * Get the current run ID from async context if available.
 */
export function getRunId(): string | undefined {
	return asyncLocalStorage.getStore()?.runId;
}

/**
 * Get the market being ingested by the current run, if any.
 */
export function getRunMarketId(): string | undefined {
	return asyncLocalStorage.getStore()?.marketId;
}
