import type { TestStatus } from '../shared.js';

export type MtrHop = {
	hopNumber: number;
	hostname: string | null;
	ipAddress: string;
	lossPercent: number;
	sentPackets: number;
	lastTime: number;
	avgTime: number;
	bestTime: number;
	worstTime: number;
	stdDev: number;
	asn?: string;
};

export type MtrResult = {
	target: string;
	status: TestStatus;
	hops: MtrHop[];
	totalHops: number;
	totalLossPercent: number;
	avgLatency: number;
	rawOutput: string;
	errorMessage?: string;
};

export type MtrAggregate = {
	totalLossPercent: number;
	avgLatency: number;
};

export type HopIdentity = {
	hostname: string | null;
	ipAddress: string;
};
