import config from 'config';
import type { CommandInterface } from '../types.js';
import { PingCommand, pingCmd, type PingOptions } from '../command/ping-command.js';
import { TracerouteCommand, traceCmd, type TraceOptions } from '../command/traceroute-command.js';
import { MtrCommand, mtrCmd, type MtrOptions } from '../command/mtr-command.js';
import { SpeedTestCommand, speedTestCmd, type SpeedTestOptions } from '../command/speedtest-command.js';
import type { PingResult } from '../command/handlers/ping/parse.js';
import type { TracerouteResult } from '../command/handlers/traceroute/parse.js';
import type { MtrResult } from '../command/handlers/mtr/types.js';
import type { SpeedTestResult } from '../command/handlers/speedtest/parse.js';
import { scopedLogger } from './logger.js';
import { loadThresholds, type Thresholds } from './thresholds.js';

const logger = scopedLogger('test-runner');

export type NetworkTest = {
	target: string;
	startedAt: Date;
	ping?: PingResult;
	traceroute?: TracerouteResult;
	mtr?: MtrResult;
	speedTest?: SpeedTestResult;
};

export type TestRun = {
	startedAt: Date;
	completedAt: Date;
	tests: NetworkTest[];
};

export type TestProgress = {
	target: string;
	completed: number;
	total: number;
	progress: number;
};

type SubTestKind = 'ping' | 'traceroute' | 'mtr' | 'speedTest';

export type RunnerCommands = {
	ping: CommandInterface<PingOptions, PingResult>;
	traceroute: CommandInterface<TraceOptions, TracerouteResult>;
	mtr: CommandInterface<MtrOptions, MtrResult>;
	speedTest: CommandInterface<SpeedTestOptions, SpeedTestResult>;
};

export type RunnerOptions = {
	concurrency: number;
	ping: Omit<PingOptions, 'type' | 'target'>;
	traceroute: Omit<TraceOptions, 'type' | 'target'>;
	mtr: Omit<MtrOptions, 'type' | 'target'>;
	speedTest: {
		enabled: boolean;
		targets: string[];
	};
};

export const getRunnerOptions = (): RunnerOptions => ({
	concurrency: config.get<number>('runner.concurrency'),
	ping: {
		packets: config.get<number>('commands.ping.packets'),
		deadline: config.get<number>('commands.ping.deadline'),
	},
	traceroute: {
		maxHops: config.get<number>('commands.traceroute.maxHops'),
		wait: config.get<number>('commands.traceroute.wait'),
	},
	mtr: {
		packets: config.get<number>('commands.mtr.packets'),
	},
	speedTest: {
		enabled: config.get<boolean>('commands.speedtest.enabled'),
		targets: config.get<string[]>('runner.speedtestTargets'),
	},
});

export class TestRunner {
	private readonly running = new Set<NetworkTest>();

	constructor (
		private readonly commands: RunnerCommands,
		private readonly options: RunnerOptions,
	) {}

	async run (targets: string[]): Promise<TestRun> {
		const startedAt = new Date();
		const tests: NetworkTest[] = [];
		const queue = [ ...targets.entries() ];
		const workerCount = Math.min(Math.max(1, this.options.concurrency), targets.length);

		const worker = async (): Promise<void> => {
			for (let next = queue.shift(); next; next = queue.shift()) {
				const [ index, target ] = next;
				tests[index] = await this.runTarget(target);
			}
		};

		await Promise.all(Array.from({ length: workerCount }, worker));

		return { startedAt, completedAt: new Date(), tests };
	}

	async runTarget (target: string): Promise<NetworkTest> {
		const test: NetworkTest = { target, startedAt: new Date() };
		this.running.add(test);
		logger.info(`Testing ${target}.`);

		try {
			await Promise.all([
				this.runSubTest(test, 'ping', () => this.commands.ping.run({ type: 'ping', target, ...this.options.ping })),
				this.runSubTest(test, 'traceroute', () => this.commands.traceroute.run({ type: 'traceroute', target, ...this.options.traceroute })),
				this.runSubTest(test, 'mtr', () => this.commands.mtr.run({ type: 'mtr', target, ...this.options.mtr })),
			]);

			if (this.shouldRunSpeedTest(target)) {
				await this.runSubTest(test, 'speedTest', () => this.commands.speedTest.run({ type: 'speedtest' }));
			}
		} finally {
			this.running.delete(test);
		}

		return test;
	}

	getProgress (target: string): TestProgress | undefined {
		const [ test ] = this.findRunning(target);

		if (!test) {
			return undefined;
		}

		const total = this.shouldRunSpeedTest(target) ? 4 : 3;
		const completed = [ test.ping, test.traceroute, test.mtr, test.speedTest ].filter(Boolean).length;

		return { target, completed, total, progress: completed / total };
	}

	/**
	 * Stops recording results for every running test of the target. Commands
	 * already running are left to finish and whatever they return is dropped.
	 */
	cancel (target: string): boolean {
		const tests = this.findRunning(target);

		for (const test of tests) {
			this.running.delete(test);
		}

		return tests.length > 0;
	}

	cancelAll (): number {
		const count = this.running.size;
		this.running.clear();
		return count;
	}

	private findRunning (target: string): NetworkTest[] {
		return [ ...this.running ].filter(test => test.target === target);
	}

	private shouldRunSpeedTest (target: string): boolean {
		return this.options.speedTest.enabled && this.options.speedTest.targets.includes(target);
	}

	private async runSubTest<K extends SubTestKind> (test: NetworkTest, kind: K, execute: () => Promise<NonNullable<NetworkTest[K]>>): Promise<void> {
		try {
			const result = await execute();

			if (!this.running.has(test)) {
				logger.debug(`Discarding the ${kind} result of cancelled target ${test.target}.`);
				return;
			}

			test[kind] = result;
		} catch (error: unknown) {
			logger.error(`The ${kind} test of ${test.target} did not complete.`, error);
		}
	}
}

export const createTestRunner = (thresholds: Thresholds = loadThresholds(), options: RunnerOptions = getRunnerOptions()): TestRunner => new TestRunner({
	ping: new PingCommand(pingCmd, thresholds.ping),
	traceroute: new TracerouteCommand(traceCmd, thresholds.traceroute),
	mtr: new MtrCommand(mtrCmd, thresholds.mtr),
	speedTest: new SpeedTestCommand(speedTestCmd),
}, options);
