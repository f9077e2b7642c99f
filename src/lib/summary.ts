import _ from 'lodash';
import type { NetworkTest, TestRun } from './test-runner.js';

export type OverallStatus = 'excellent' | 'good' | 'fair' | 'poor';

export type TestSummary = {
	totalTests: number;
	successfulTests: number;
	warningTests: number;
	failedTests: number;
	averageLatency: number;
	averagePacketLoss: number;
	successRate: number;
	overallStatus: OverallStatus;
	executionTime: number;
};

const OVERALL_STATUS_BANDS: Array<[ number, OverallStatus ]> = [
	[ 90, 'excellent' ],
	[ 70, 'good' ],
	[ 50, 'fair' ],
];

export const getOverallStatus = (successRate: number): OverallStatus => {
	const percent = successRate * 100;
	return OVERALL_STATUS_BANDS.find(([ minimum ]) => percent >= minimum)?.[1] ?? 'poor';
};

/**
 * Run-level health. Only the ping result classifies a target; a target
 * without one counts as failed.
 */
export const summarize = (tests: NetworkTest[], executionTime = 0): TestSummary => {
	let successfulTests = 0;
	let warningTests = 0;
	let failedTests = 0;
	const latencies: number[] = [];

	for (const { ping } of tests) {
		if (ping?.status === 'success') {
			successfulTests++;
			latencies.push(ping.avgTime);
		} else if (ping?.status === 'warning') {
			warningTests++;
		} else {
			failedTests++;
		}
	}

	const losses = tests.flatMap(test => test.ping ? [ test.ping.packetLossPercent ] : []);
	const successRate = tests.length > 0 ? successfulTests / tests.length : 0;

	return {
		totalTests: tests.length,
		successfulTests,
		warningTests,
		failedTests,
		averageLatency: latencies.length > 0 ? _.mean(latencies) : 0,
		averagePacketLoss: losses.length > 0 ? _.mean(losses) : 0,
		successRate,
		overallStatus: getOverallStatus(successRate),
		executionTime,
	};
};

export const summarizeRun = (run: TestRun): TestSummary => summarize(run.tests, (run.completedAt.getTime() - run.startedAt.getTime()) / 1000);
