import type { TestRun } from '../../../src/lib/test-runner.js';
import { makeTest } from '../lib/fixtures.js';

export const getTestRun = (): TestRun => ({
	startedAt: new Date('2024-01-02T03:04:00.000Z'),
	completedAt: new Date('2024-01-02T03:04:42.500Z'),
	tests: [
		{
			...makeTest('8.8.8.8', {}),
			traceroute: { target: '8.8.8.8', status: 'success', hops: [], totalHops: 5, rawOutput: '' },
			mtr: { target: '8.8.8.8', status: 'success', hops: [], totalHops: 3, totalLossPercent: 0, avgLatency: 7, rawOutput: '' },
		},
		{
			...makeTest('example.invalid', {
				status: 'failed',
				packetsSent: 0,
				packetsReceived: 0,
				packetLossPercent: 100,
				minTime: 0,
				avgTime: 0,
				maxTime: 0,
				mdevTime: 0,
				errorMessage: 'ping: example.invalid: Name or service not known',
			}),
			mtr: {
				target: 'example.invalid',
				status: 'failed',
				hops: [],
				totalHops: 0,
				totalLossPercent: 100,
				avgLatency: 0,
				rawOutput: '',
				errorMessage: 'mtr: "example.invalid" not found, giving up',
			},
		},
	],
});
