import type { BoundaryResolution, Interval, IntervalFetchResult, RunResult, RunStatus } from "./types";

/**
 * Counters for one ingestion run. Lives only as long as the run.
 */
export class RunStats {
	newCount = 0;
	duplicateCount = 0;
	invalidCount = 0;
	outOfWindowCount = 0;
	pages = 0;
	processedIntervals = 0;
	batchesFlushed = 0;
	rowsWritten = 0;
	readonly truncatedIntervals: Interval[] = [];
	readonly failedIntervals: Interval[] = [];
	private readonly startedAt = Date.now();

	/**
	 * Record the fetch outcome of one interval.
	 * Called once per interval, after its records were deduplicated.
	 */
	recordInterval(result: IntervalFetchResult): void {
		this.processedIntervals++;
		this.pages += result.pages;
		this.invalidCount += result.invalid;
		this.outOfWindowCount += result.outOfWindow;
		if (result.truncated) this.truncatedIntervals.push(result.interval);
		if (result.failed) this.failedIntervals.push(result.interval);
	}

	/**
	 * Record a flushed batch.
	 */
	recordFlush(rowsWritten: number): void {
		this.batchesFlushed++;
		this.rowsWritten += rowsWritten;
	}

	get durationMs(): number {
		return Date.now() - this.startedAt;
	}

	toResult(params: {
		runId: string;
		marketId: string;
		status: RunStatus;
		boundary: BoundaryResolution | null;
		totalIntervals: number;
		pendingIntervals: Interval[];
		error?: string;
	}): RunResult {
		const result: RunResult = {
			runId: params.runId,
			marketId: params.marketId,
			status: params.status,
			completed: params.status === "completed" && this.failedIntervals.length === 0,
			newCount: this.newCount,
			persistedCount: this.rowsWritten,
			duplicateCount: this.duplicateCount,
			invalidCount: this.invalidCount,
			truncatedIntervals: [...this.truncatedIntervals],
			failedIntervals: [...this.failedIntervals],
			pendingIntervals: params.pendingIntervals,
			totalIntervals: params.totalIntervals,
			processedIntervals: this.processedIntervals,
			batchesFlushed: this.batchesFlushed,
			boundary: params.boundary,
			durationMs: this.durationMs,
		};
		if (params.error !== undefined) {
			result.error = params.error;
		}
		return result;
	}
}
