import { expect } from 'chai';
import { getOverallStatus, summarize, summarizeRun } from '../../../src/lib/summary.js';
import { makeTest } from './fixtures.js';

describe('summary', () => {
	it('should summarize an empty run', () => {
		expect(summarize([])).to.deep.equal({
			totalTests: 0,
			successfulTests: 0,
			warningTests: 0,
			failedTests: 0,
			averageLatency: 0,
			averagePacketLoss: 0,
			successRate: 0,
			overallStatus: 'poor',
			executionTime: 0,
		});
	});

	it('should count ping statuses', () => {
		const summary = summarize([
			makeTest('8.8.8.8', { avgTime: 10 }),
			makeTest('1.1.1.1', { avgTime: 30 }),
			makeTest('9.9.9.9', { status: 'warning', packetLossPercent: 60, avgTime: 100 }),
			makeTest('10.255.255.1', { status: 'failed', packetLossPercent: 100, avgTime: 0 }),
		], 12.5);

		expect(summary).to.deep.equal({
			totalTests: 4,
			successfulTests: 2,
			warningTests: 1,
			failedTests: 1,
			averageLatency: 20,
			averagePacketLoss: 40,
			successRate: 0.5,
			overallStatus: 'fair',
			executionTime: 12.5,
		});
	});

	it('should count a target without a ping result as failed', () => {
		const summary = summarize([ makeTest('8.8.8.8', {}), makeTest('1.1.1.1') ]);

		expect(summary.failedTests).to.equal(1);
		expect(summary.averagePacketLoss).to.equal(0);
		expect(summary.successRate).to.equal(0.5);
	});

	it('should keep the counts consistent', () => {
		const summary = summarize([ makeTest('a', {}), makeTest('b', { status: 'warning' }), makeTest('c') ]);
		expect(summary.successfulTests + summary.warningTests + summary.failedTests).to.equal(summary.totalTests);
	});

	it('should take the execution time from the run', () => {
		const summary = summarizeRun({
			startedAt: new Date('2024-01-02T03:04:00.000Z'),
			completedAt: new Date('2024-01-02T03:04:42.500Z'),
			tests: [],
		});

		expect(summary.executionTime).to.equal(42.5);
	});

	describe('overall status', () => {
		it('should use the success rate bands', () => {
			expect(getOverallStatus(1)).to.equal('excellent');
			expect(getOverallStatus(0.9)).to.equal('excellent');
			expect(getOverallStatus(0.75)).to.equal('good');
			expect(getOverallStatus(0.5)).to.equal('fair');
			expect(getOverallStatus(0.25)).to.equal('poor');
			expect(getOverallStatus(0)).to.equal('poor');
		});
	});
});
