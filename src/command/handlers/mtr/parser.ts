import _ from 'lodash';
import ipRegex from 'ip-regex';
import {
	errorMessage,
	splitLines,
	toFloat,
	toInteger,
	type TestStatus,
} from '../shared.js';
import { DEFAULT_THRESHOLDS, type MtrThresholds } from '../../../lib/thresholds.js';
import type {
	HopIdentity,
	MtrAggregate,
	MtrHop,
	MtrResult,
} from './types.js';

export const UNKNOWN_HOST = '???';

const UNKNOWN_NAMES = new Set([ UNKNOWN_HOST, `AS${UNKNOWN_HOST}` ]);

const reHopLine = /^\s*(?<hop>\d+)\.(?:\|--)?\s*(?:(?<asn>AS(?:\d+|\?\?\?))\s+)?(?<host>\S.*?)\s+(?<loss>[\d.]+)%?\s+(?<snt>\d+)\s+(?<last>[\d.]+)\s+(?<avg>[\d.]+)\s+(?<best>[\d.]+)\s+(?<wrst>[\d.]+)\s+(?<stdev>[\d.]+)\s*$/;
const reFallbackHop = /^\s*(?<hop>\d+)\.(?:\|--)?(?:\s|$)/;
const reParenIp = new RegExp(`\\((?<ip>${ipRegex.v4().source})\\)`);
const reAsn = /^AS(?:\d+|\?\?\?)$/;
const reLossToken = /^[\d.]+%$/;
const reDecimalToken = /^\d+\.\d+$/;
const reIntegerToken = /^\d+$/;

const getSpacing = (length: number): string => Array.from({ length }).fill(' ').join('');
const withSpacing = (string_: string | number, dSpacing: number, left = false): string => {
	const sSpacing = getSpacing(dSpacing - String(string_).length);

	if (left) {
		return `${sSpacing}${string_}`;
	}

	return `${string_}${sSpacing}`;
};

const isHeaderLine = (line: string): boolean => {
	const trimmed = line.trim();
	return !trimmed || line.includes('HOST:') || line.includes('Loss%') || trimmed.startsWith('Start');
};

const normalizeAsn = (asn: string | undefined): string | undefined => asn && !UNKNOWN_NAMES.has(asn) ? asn : undefined;

export const hopLabel = (hop: Pick<MtrHop, 'hostname' | 'ipAddress'>): string => {
	if (hop.ipAddress === UNKNOWN_HOST) {
		return '(waiting for reply)';
	}

	if (!hop.hostname || hop.hostname === hop.ipAddress) {
		return hop.ipAddress;
	}

	return `${hop.hostname} (${hop.ipAddress})`;
};

export const MtrParser = {
	resolveIdentity (field: string): HopIdentity {
		const name = field.trim();
		const parenMatch = reParenIp.exec(name);

		if (parenMatch) {
			const outside = name.replace(parenMatch[0], '').trim();

			return {
				hostname: outside && !UNKNOWN_NAMES.has(outside) ? outside : null,
				ipAddress: parenMatch.groups?.['ip'] ?? UNKNOWN_HOST,
			};
		}

		if (!name || UNKNOWN_NAMES.has(name)) {
			return { hostname: null, ipAddress: UNKNOWN_HOST };
		}

		// Bare address or bare name.
		return { hostname: name, ipAddress: name };
	},

	parseLine (line: string): MtrHop | undefined {
		if (isHeaderLine(line)) {
			return;
		}

		const match = reHopLine.exec(line);

		if (!match?.groups) {
			return MtrParser.parseFallbackLine(line);
		}

		const groups = match.groups;
		const asn = normalizeAsn(groups['asn']);

		return {
			hopNumber: toInteger(groups['hop'], 'hop number'),
			...MtrParser.resolveIdentity(groups['host'] ?? ''),
			lossPercent: Math.min(100, toFloat(groups['loss'], 'loss')),
			sentPackets: toInteger(groups['snt'], 'sent packets'),
			lastTime: toFloat(groups['last'], 'last'),
			avgTime: toFloat(groups['avg'], 'avg'),
			bestTime: toFloat(groups['best'], 'best'),
			worstTime: toFloat(groups['wrst'], 'worst'),
			stdDev: toFloat(groups['stdev'], 'stdev'),
			...(asn ? { asn } : {}),
		};
	},

	parseFallbackLine (line: string): MtrHop | undefined {
		const match = reFallbackHop.exec(line);

		if (!match) {
			return;
		}

		const tokens = line.trim().split(/\s+/).slice(1).filter(token => token !== '|--');
		const lossIndex = tokens.findIndex(token => reLossToken.test(token));

		if (lossIndex === -1) {
			return;
		}

		const nameTokens = tokens.slice(0, lossIndex).filter(token => !reAsn.test(token));
		const asn = normalizeAsn(tokens.slice(0, lossIndex).find(token => reAsn.test(token)));
		const valueTokens = tokens.slice(lossIndex + 1);
		const times = valueTokens.filter(token => reDecimalToken.test(token)).map(token => toFloat(token, 'time'));
		const sentToken = valueTokens.find(token => reIntegerToken.test(token));

		return {
			hopNumber: toInteger(match.groups?.['hop'], 'hop number'),
			...MtrParser.resolveIdentity(nameTokens.join(' ')),
			lossPercent: Math.min(100, toFloat(tokens[lossIndex]?.slice(0, -1), 'loss')),
			sentPackets: sentToken ? toInteger(sentToken, 'sent packets') : 0,
			lastTime: times[times.length - 1] ?? 0,
			avgTime: times.length > 0 ? _.mean(times) : 0,
			bestTime: _.min(times) ?? 0,
			worstTime: _.max(times) ?? 0,
			stdDev: 0,
			...(asn ? { asn } : {}),
		};
	},

	aggregate (hops: MtrHop[], thresholds: MtrThresholds): MtrAggregate {
		if (hops.length === 0) {
			return { totalLossPercent: 0, avgLatency: 0 };
		}

		// Worst hop, or the mean of the lossy hops if higher.
		let totalLossPercent = _.max(hops.map(hop => hop.lossPercent)) ?? 0;
		const problematicHops = hops.filter(hop => hop.lossPercent > thresholds.problematicHopLoss);

		if (problematicHops.length > 0) {
			totalLossPercent = Math.max(totalLossPercent, _.meanBy(problematicHops, hop => hop.lossPercent));
		}

		const respondingHops = hops.filter(hop => hop.avgTime > 0);

		return {
			totalLossPercent,
			avgLatency: respondingHops.length > 0 ? _.meanBy(respondingHops, hop => hop.avgTime) : 0,
		};
	},

	getStatus (hops: MtrHop[], aggregate: MtrAggregate, thresholds: MtrThresholds): TestStatus {
		if (hops.length === 0) {
			return 'failed';
		}

		if (aggregate.totalLossPercent > thresholds.failedLoss) {
			return 'failed';
		}

		if (
			aggregate.totalLossPercent > thresholds.warningLoss
			|| aggregate.avgLatency > thresholds.warningLatency
			|| hops.some(hop => hop.lossPercent > thresholds.hopWarningLoss)
		) {
			return 'warning';
		}

		return 'success';
	},

	parse (rawOutput: string, target: string, thresholds: MtrThresholds = DEFAULT_THRESHOLDS.mtr): MtrResult {
		try {
			const hops: MtrHop[] = [];

			for (const line of splitLines(rawOutput)) {
				const hop = MtrParser.parseLine(line);

				if (hop) {
					hops.push(hop);
				}
			}

			const aggregate = MtrParser.aggregate(hops, thresholds);

			return {
				target,
				status: MtrParser.getStatus(hops, aggregate, thresholds),
				hops,
				totalHops: hops.length,
				...aggregate,
				rawOutput,
			};
		} catch (error: unknown) {
			return {
				target,
				status: 'failed',
				hops: [],
				totalHops: 0,
				totalLossPercent: 100,
				avgLatency: 0,
				rawOutput,
				errorMessage: errorMessage(error),
			};
		}
	},

	outputBuilder (hops: MtrHop[]): string {
		if (hops.length === 0) {
			return '';
		}

		const spacings = {
			index: Math.max(...hops.map(h => String(h.hopNumber).length)),
			asn: Math.max(1, ...hops.map(h => (h.asn ?? '-').length)),
			host: Math.max(4, ...hops.map(h => hopLabel(h).length)),
			loss: 6,
			snt: 4,
			time: 6,
		};

		const header = [
			withSpacing('Host', spacings.index + 2 + spacings.asn + 1 + spacings.host),
			withSpacing('Loss%', spacings.loss, true),
			withSpacing('Snt', spacings.snt, true),
			withSpacing('Last', spacings.time, true),
			withSpacing('Avg', spacings.time, true),
			withSpacing('Best', spacings.time, true),
			withSpacing('Wrst', spacings.time, true),
			withSpacing('StDev', spacings.time, true),
		];

		const rows = hops.map((hop) => {
			const times = [ hop.lastTime, hop.avgTime, hop.bestTime, hop.worstTime, hop.stdDev ]
				.map(time => withSpacing(time.toFixed(1), spacings.time, true));

			return [
				`${withSpacing(hop.hopNumber, spacings.index, true)}. ${withSpacing(hop.asn ?? '-', spacings.asn)} ${withSpacing(hopLabel(hop), spacings.host)}`,
				withSpacing(`${hop.lossPercent.toFixed(1)}%`, spacings.loss, true),
				withSpacing(hop.sentPackets, spacings.snt, true),
				...times,
			].join(' ');
		});

		return [ header.join(' '), ...rows ].join('\n');
	},
};

export default MtrParser;
