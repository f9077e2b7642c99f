import type { NetworkTest, TestRun } from '../lib/test-runner.js';

type CsvValue = string | number | undefined;

const columns = [
	'target',
	'ping_status',
	'packets_sent',
	'packets_received',
	'packet_loss_percent',
	'min_ms',
	'avg_ms',
	'max_ms',
	'mdev_ms',
	'traceroute_status',
	'total_hops',
	'mtr_status',
	'mtr_total_loss_percent',
	'mtr_avg_latency_ms',
	'errors',
];

export const escapeCsvValue = (value: CsvValue): string => {
	const text = value === undefined ? '' : String(value);

	if (/[",\r\n]/.test(text)) {
		return `"${text.replaceAll('"', '""')}"`;
	}

	return text;
};

const collectErrors = (test: NetworkTest): string => [ test.ping, test.traceroute, test.mtr ]
	.flatMap(result => result?.errorMessage ? [ result.errorMessage ] : [])
	.join('; ');

const toRow = (test: NetworkTest): CsvValue[] => [
	test.target,
	test.ping?.status,
	test.ping?.packetsSent,
	test.ping?.packetsReceived,
	test.ping?.packetLossPercent,
	test.ping?.minTime,
	test.ping?.avgTime,
	test.ping?.maxTime,
	test.ping?.mdevTime,
	test.traceroute?.status,
	test.traceroute?.totalHops,
	test.mtr?.status,
	test.mtr?.totalLossPercent,
	test.mtr?.avgLatency,
	collectErrors(test),
];

export const buildCsvReport = (run: TestRun): string => {
	const rows = [ columns, ...run.tests.map(toRow) ];
	return `${rows.map(row => row.map(escapeCsvValue).join(',')).join('\n')}\n`;
};
