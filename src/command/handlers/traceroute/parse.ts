import {
	type TestStatus,
	errorMessage,
	findIpv4,
	splitLines,
	toFloat,
	toInteger,
} from '../shared.js';
import { DEFAULT_THRESHOLDS, type TracerouteThresholds } from '../../../lib/thresholds.js';

const reRtt = /(?<rtt>\d+(?:\.\d+)?)\s*ms\b/;
const reHopNumber = /^\d+$/;

export type TracerouteHop = {
	hopNumber: number;
	ipAddress: string;
	responseTime: number;
	isTimeout: boolean;
};

export type TracerouteResult = {
	target: string;
	status: TestStatus;
	hops: TracerouteHop[];
	totalHops: number;
	rawOutput: string;
	errorMessage?: string;
};

export const getTracerouteStatus = (hops: TracerouteHop[], thresholds: TracerouteThresholds): TestStatus => {
	if (hops.length === 0) {
		return 'failed';
	}

	if (hops.length > thresholds.maxHops) {
		return 'warning';
	}

	return 'success';
};

export function parseHopLine (line: string): TracerouteHop | undefined {
	const trimmed = line.trim();

	if (!trimmed || trimmed.startsWith('traceroute')) {
		return;
	}

	const [ first ] = trimmed.split(/\s+/);

	if (!first || !reHopNumber.test(first)) {
		return;
	}

	const rttMatch = reRtt.exec(trimmed);
	const responseTime = rttMatch ? toFloat(rttMatch.groups?.['rtt'], 'response time') : undefined;

	return {
		hopNumber: toInteger(first, 'hop number'),
		ipAddress: findIpv4(trimmed) ?? '*',
		responseTime: responseTime ?? 0,
		isTimeout: trimmed.includes('*') && responseTime === undefined,
	};
}

export default function parse (rawOutput: string, target: string, thresholds: TracerouteThresholds = DEFAULT_THRESHOLDS.traceroute): TracerouteResult {
	try {
		const hops: TracerouteHop[] = [];

		for (const line of splitLines(rawOutput)) {
			const hop = parseHopLine(line);

			if (hop) {
				hops.push(hop);
			}
		}

		return {
			target,
			status: getTracerouteStatus(hops, thresholds),
			hops,
			totalHops: hops.length,
			rawOutput,
		};
	} catch (error: unknown) {
		return {
			target,
			status: 'failed',
			hops: [],
			totalHops: 0,
			rawOutput,
			errorMessage: errorMessage(error),
		};
	}
}
