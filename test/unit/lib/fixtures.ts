import type { PingResult } from '../../../src/command/handlers/ping/parse.js';
import type { NetworkTest } from '../../../src/lib/test-runner.js';

export const makePing = (target: string, fields: Partial<PingResult> = {}): PingResult => ({
	target,
	status: 'success',
	packetsSent: 4,
	packetsReceived: 4,
	packetLossPercent: 0,
	minTime: 10,
	avgTime: 20,
	maxTime: 30,
	mdevTime: 2,
	rawOutput: '',
	...fields,
});

export const makeTest = (target: string, ping?: Partial<PingResult>): NetworkTest => ({
	target,
	startedAt: new Date('2024-01-02T03:04:00.000Z'),
	...(ping ? { ping: makePing(target, ping) } : {}),
});
