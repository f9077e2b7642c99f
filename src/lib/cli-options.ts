import { parseArgs } from 'node:util';
import Joi from 'joi';
import { InvalidOptionsException } from '../command/exception/invalid-options-exception.js';
import { REPORT_FORMATS, type ReportFormat } from '../report/report-writer.js';

export type CliOptions = {
	targets: string[];
	formats: ReportFormat[];
	output: string;
	concurrency?: number;
	speedTest: boolean;
	quiet: boolean;
	help: boolean;
};

export type CliDefaults = {
	formats: ReportFormat[];
	output: string;
};

export const USAGE = `Usage: netdiag [targets...] [options]

Runs ping, traceroute and mtr against every target and writes reports.
Without targets, the targets from the configuration are used.

Options:
  -f, --format <list>      report formats, comma separated (json, csv, text)
  -o, --output <dir>       report directory
  -c, --concurrency <n>    targets tested at the same time
      --no-speedtest       skip the speed test
  -q, --quiet              do not print the text report
  -h, --help               show this help
`;

const cliOptionsSchema = Joi.object<CliOptions>({
	targets: Joi.array().items(Joi.string()).required(),
	formats: Joi.array().items(Joi.string().valid(...REPORT_FORMATS)).min(1).unique().required(),
	output: Joi.string().required(),
	concurrency: Joi.number().integer().min(1),
	speedTest: Joi.boolean().required(),
	quiet: Joi.boolean().required(),
	help: Joi.boolean().required(),
});

export function parseCliOptions (argv: string[], defaults: CliDefaults): CliOptions {
	const { values, positionals } = parseArgs({
		args: argv,
		allowPositionals: true,
		options: {
			'format': { type: 'string', short: 'f' },
			'output': { type: 'string', short: 'o' },
			'concurrency': { type: 'string', short: 'c' },
			'no-speedtest': { type: 'boolean' },
			'quiet': { type: 'boolean', short: 'q' },
			'help': { type: 'boolean', short: 'h' },
		},
	});

	const validationResult = cliOptionsSchema.validate({
		targets: positionals,
		formats: values.format ? values.format.split(',').map(format => format.trim()) : defaults.formats,
		output: values.output ?? defaults.output,
		concurrency: values.concurrency,
		speedTest: !values['no-speedtest'],
		quiet: values.quiet ?? false,
		help: values.help ?? false,
	});

	if (validationResult.error) {
		throw new InvalidOptionsException('netdiag', validationResult.error);
	}

	return validationResult.value;
}
