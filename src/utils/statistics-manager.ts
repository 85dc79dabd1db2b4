/**
 * Statistics manager to track per-language fill results and run totals
 */

import type { FillReport, LanguageResult } from "../types/index.js";

export class StatisticsManager {
	private stats: FillReport;

	constructor() {
		this.stats = this.initializeReport();
	}

	initializeReport(dryRun = false): FillReport {
		return {
			languages: [],
			totalFilled: 0,
			languageCount: 0,
			failed: 0,
			skipped: 0,
			dryRun,
			startTime: new Date().toISOString(),
		};
	}

	reset(dryRun = false): void {
		this.stats = this.initializeReport(dryRun);
	}

	record(result: LanguageResult): void {
		this.stats.languages.push(result);
		this.stats.languageCount++;
		this.stats.totalFilled += result.filled;

		if (result.status === "failed") {
			this.stats.failed++;
		} else if (result.status === "missing-file" || result.status === "unknown-language") {
			this.stats.skipped++;
		}
	}

	finish(): FillReport {
		const end = new Date();
		this.stats.endTime = end.toISOString();
		this.stats.totalDuration = end.getTime() - new Date(this.stats.startTime).getTime();
		return this.stats;
	}

	getStats(): FillReport {
		return this.stats;
	}
}
