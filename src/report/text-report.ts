import type { PingResult } from '../command/handlers/ping/parse.js';
import type { TracerouteResult } from '../command/handlers/traceroute/parse.js';
import type { MtrResult } from '../command/handlers/mtr/types.js';
import type { SpeedTestResult } from '../command/handlers/speedtest/parse.js';
import MtrParser from '../command/handlers/mtr/parser.js';
import type { NetworkTest, TestRun } from '../lib/test-runner.js';
import type { TestSummary } from '../lib/summary.js';

const withError = (lines: string[], errorMessage: string | undefined): string[] => errorMessage ? [ ...lines, `  Error: ${errorMessage}` ] : lines;

export const formatPing = (ping: PingResult): string[] => withError([
	`Ping: ${ping.status.toUpperCase()}`,
	`  ${ping.packetsReceived}/${ping.packetsSent} received, ${ping.packetLossPercent}% loss`,
	`  rtt min/avg/max/mdev = ${[ ping.minTime, ping.avgTime, ping.maxTime, ping.mdevTime ].map(time => time.toFixed(3)).join('/')} ms`,
], ping.errorMessage);

export const formatTraceroute = (traceroute: TracerouteResult): string[] => withError([
	`Traceroute: ${traceroute.status.toUpperCase()} (${traceroute.totalHops} hops)`,
	...traceroute.hops.map((hop) => {
		const time = hop.isTimeout ? 'timeout' : `${hop.responseTime.toFixed(3)} ms`;
		return `  ${String(hop.hopNumber).padStart(2)}  ${hop.ipAddress.padEnd(15)}  ${time}`;
	}),
], traceroute.errorMessage);

export const formatMtr = (mtr: MtrResult): string[] => withError([
	`MTR: ${mtr.status.toUpperCase()} (${mtr.totalHops} hops, loss ${mtr.totalLossPercent.toFixed(1)}%, avg latency ${mtr.avgLatency.toFixed(1)} ms)`,
	...MtrParser.outputBuilder(mtr.hops).split('\n').filter(Boolean).map(line => `  ${line}`),
], mtr.errorMessage);

export const formatSpeedTest = (speedTest: SpeedTestResult): string[] => withError([
	`Speed test: ${speedTest.status.toUpperCase()}`,
	`  download ${speedTest.downloadSpeed.toFixed(2)} Mbps, upload ${speedTest.uploadSpeed.toFixed(2)} Mbps, ping ${speedTest.pingLatency.toFixed(1)} ms`,
	...(speedTest.serverName ? [ `  server ${speedTest.serverName} (${speedTest.serverLocation})` ] : []),
], speedTest.errorMessage);

export const formatTest = (test: NetworkTest): string[] => [
	`== ${test.target} ==`,
	...(test.ping ? formatPing(test.ping) : [ 'Ping: not run' ]),
	...(test.traceroute ? formatTraceroute(test.traceroute) : []),
	...(test.mtr ? formatMtr(test.mtr) : []),
	...(test.speedTest ? formatSpeedTest(test.speedTest) : []),
];

export const formatSummary = (summary: TestSummary): string[] => [
	'== Summary ==',
	`Targets: ${summary.totalTests}  Successful: ${summary.successfulTests}  Warning: ${summary.warningTests}  Failed: ${summary.failedTests}`,
	`Success rate: ${(summary.successRate * 100).toFixed(1)}% (${summary.overallStatus})`,
	`Average latency: ${summary.averageLatency.toFixed(2)} ms`,
	`Average packet loss: ${summary.averagePacketLoss.toFixed(1)}%`,
	`Execution time: ${summary.executionTime.toFixed(1)} s`,
];

export const buildTextReport = (run: TestRun, summary: TestSummary): string => [
	'Network diagnostic report',
	`Started: ${run.startedAt.toISOString()}`,
	`Completed: ${run.completedAt.toISOString()}`,
	'',
	...run.tests.flatMap(test => [ ...formatTest(test), '' ]),
	...formatSummary(summary),
].join('\n');
