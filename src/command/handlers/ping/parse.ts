import {
	type MatchRule,
	type TestStatus,
	clampPercent,
	errorMessage,
	matchFirst,
	toFloat,
	toInteger,
} from '../shared.js';
import { DEFAULT_THRESHOLDS, type PingThresholds } from '../../../lib/thresholds.js';

type PingStats = {
	total: number;
	rcv: number;
	loss: number;
};

type PingRtt = {
	min: number;
	avg: number;
	max: number;
	mdev: number;
};

export type PingResult = {
	target: string;
	status: TestStatus;
	packetsSent: number;
	packetsReceived: number;
	packetLossPercent: number;
	minTime: number;
	avgTime: number;
	maxTime: number;
	mdevTime: number;
	rawOutput: string;
	errorMessage?: string;
};

const statsRules: MatchRule[] = [
	{
		name: 'pt',
		pattern: /(?<total>\d+) pacotes transmitidos, (?<rcv>\d+) (?:pacotes )?recebidos.*?(?<loss>\d+(?:\.\d+)?)% (?:de )?(?:perda de pacotes|packet loss)/,
	},
	{
		name: 'en',
		pattern: /(?<total>\d+) packets transmitted, (?<rcv>\d+) (?:packets )?received.*?(?<loss>\d+(?:\.\d+)?)% packet loss/,
	},
];

const rttRules: MatchRule[] = [
	{
		name: 'iputils',
		pattern: /rtt min\/avg\/max\/mdev = (?<min>[\d.]+)\/(?<avg>[\d.]+)\/(?<max>[\d.]+)\/(?<mdev>[\d.]+) ms/,
	},
	{
		name: 'bsd',
		pattern: /round-trip min\/avg\/max\/(?:stddev|std-dev) = (?<min>[\d.]+)\/(?<avg>[\d.]+)\/(?<max>[\d.]+)\/(?<mdev>[\d.]+) ms/,
	},
];

export const getPingStatus = (stats: PingStats | undefined, rtt: PingRtt | undefined, thresholds: PingThresholds): TestStatus => {
	if ((!stats || stats.total === 0) && !rtt) {
		return 'failed';
	}

	const loss = stats?.loss ?? 0;

	if (loss === 100) {
		return 'failed';
	}

	if (loss > thresholds.warningLoss) {
		return 'warning';
	}

	return 'success';
};

function parseStats (rawOutput: string): PingStats | undefined {
	const match = matchFirst(statsRules, rawOutput);

	if (!match) {
		return;
	}

	const total = toInteger(match.groups['total'], 'packets transmitted');
	const rcv = toInteger(match.groups['rcv'], 'packets received');

	return {
		total,
		rcv: Math.min(rcv, total),
		loss: clampPercent(toFloat(match.groups['loss'], 'packet loss')),
	};
}

function parseRtt (rawOutput: string): PingRtt | undefined {
	const match = matchFirst(rttRules, rawOutput);

	if (!match) {
		return;
	}

	return {
		min: toFloat(match.groups['min'], 'rtt min'),
		avg: toFloat(match.groups['avg'], 'rtt avg'),
		max: toFloat(match.groups['max'], 'rtt max'),
		mdev: toFloat(match.groups['mdev'], 'rtt mdev'),
	};
}

export default function parse (rawOutput: string, target: string, thresholds: PingThresholds = DEFAULT_THRESHOLDS.ping): PingResult {
	try {
		const stats = parseStats(rawOutput);
		const rtt = parseRtt(rawOutput);

		return {
			target,
			status: getPingStatus(stats, rtt, thresholds),
			packetsSent: stats?.total ?? 0,
			packetsReceived: stats?.rcv ?? 0,
			packetLossPercent: stats?.loss ?? 0,
			minTime: rtt?.min ?? 0,
			avgTime: rtt?.avg ?? 0,
			maxTime: rtt?.max ?? 0,
			mdevTime: rtt?.mdev ?? 0,
			rawOutput,
		};
	} catch (error: unknown) {
		return {
			target,
			status: 'failed',
			packetsSent: 0,
			packetsReceived: 0,
			packetLossPercent: 100,
			minTime: 0,
			avgTime: 0,
			maxTime: 0,
			mdevTime: 0,
			rawOutput,
			errorMessage: errorMessage(error),
		};
	}
}
