import type { TestRun } from '../lib/test-runner.js';
import type { TestSummary } from '../lib/summary.js';

export const buildJsonReport = (run: TestRun, summary: TestSummary): string => JSON.stringify({
	startedAt: run.startedAt,
	completedAt: run.completedAt,
	summary,
	tests: run.tests,
}, null, 2);
