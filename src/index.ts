#!/usr/bin/env node
import process from 'node:process';
import config from 'config';
import { VERSION } from './constants.js';
import { parseCliOptions, USAGE } from './lib/cli-options.js';
import { scopedLogger } from './lib/logger.js';
import { summarizeRun } from './lib/summary.js';
import { resolveTargets } from './lib/targets.js';
import { createTestRunner, getRunnerOptions } from './lib/test-runner.js';
import { loadThresholds } from './lib/thresholds.js';
import { writeReports, type ReportFormat } from './report/report-writer.js';
import { buildTextReport } from './report/text-report.js';

const logger = scopedLogger('cli');

async function main (argv: string[]): Promise<number> {
	const options = parseCliOptions(argv, {
		formats: config.get<ReportFormat[]>('reports.formats'),
		output: config.get<string>('reports.outputDirectory'),
	});

	if (options.help) {
		process.stdout.write(USAGE);
		return 0;
	}

	const requested = options.targets.length > 0 ? options.targets : config.get<string[]>('targets');
	const { valid: targets, errors } = resolveTargets(requested);

	for (const error of errors) {
		logger.warn(error);
	}

	if (targets.length === 0) {
		logger.error('No valid targets to test.');
		return 1;
	}

	const runnerOptions = getRunnerOptions();
	const runner = createTestRunner(loadThresholds(), {
		...runnerOptions,
		concurrency: options.concurrency ?? runnerOptions.concurrency,
		speedTest: {
			...runnerOptions.speedTest,
			enabled: runnerOptions.speedTest.enabled && options.speedTest,
		},
	});

	logger.info(`netdiag ${VERSION}: testing ${targets.length} target(s).`);

	const run = await runner.run(targets);
	const summary = summarizeRun(run);

	if (!options.quiet) {
		process.stdout.write(`${buildTextReport(run, summary)}\n`);
	}

	for (const filePath of await writeReports(run, options.formats, options.output)) {
		logger.info(`Report written to ${filePath}.`);
	}

	return 0;
}

main(process.argv.slice(2))
	.then((exitCode) => {
		process.exitCode = exitCode;
	})
	.catch((error: unknown) => {
		logger.error(error);
		process.exitCode = 1;
	});
