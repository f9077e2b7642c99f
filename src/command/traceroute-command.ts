import config from 'config';
import Joi from 'joi';
import { execa } from 'execa';
import type { CommandInterface, CommandRunner } from '../types.js';
import { handleCommandError } from '../helper/command-error-handler.js';
import { scopedLogger } from '../lib/logger.js';
import { targetSchema } from '../lib/targets.js';
import { DEFAULT_THRESHOLDS, type TracerouteThresholds } from '../lib/thresholds.js';
import { InvalidOptionsException } from './exception/invalid-options-exception.js';
import parse, { type TracerouteResult } from './handlers/traceroute/parse.js';

export type TraceOptions = {
	type: 'traceroute';
	target: string;
	maxHops: number;
	wait: number;
};

const logger = scopedLogger('traceroute-command');

const traceOptionsSchema = Joi.object<TraceOptions>({
	type: Joi.string().valid('traceroute').required(),
	target: targetSchema.required(),
	maxHops: Joi.number().integer().min(1).max(255).default(30),
	wait: Joi.number().min(1).default(5),
});

export const argBuilder = (options: TraceOptions): string[] => {
	const args = [
		// Numeric output only
		'-n',
		// Max ttl
		[ '-m', String(options.maxHops) ],
		// Max wait per probe
		[ '-w', String(options.wait) ],
		// Target
		options.target,
	].flat();

	return args;
};

export const traceCmd: CommandRunner<TraceOptions> = (options: TraceOptions) => {
	const args = argBuilder(options);
	return execa('traceroute', args, { timeout: config.get<number>('commands.traceroute.timeout') * 1000 });
};

export class TracerouteCommand implements CommandInterface<TraceOptions, TracerouteResult> {
	constructor (
		private readonly cmd: CommandRunner<TraceOptions> = traceCmd,
		private readonly thresholds: TracerouteThresholds = DEFAULT_THRESHOLDS.traceroute,
	) {}

	async run (options: TraceOptions): Promise<TracerouteResult> {
		const validationResult = traceOptionsSchema.validate(options);

		if (validationResult.error) {
			throw new InvalidOptionsException('traceroute', validationResult.error);
		}

		const { value: cmdOptions } = validationResult;
		const parseOutput = (output: string) => parse(output, cmdOptions.target, this.thresholds);

		try {
			const cmdResult = await this.cmd(cmdOptions);

			if (cmdResult.stdout.length === 0) {
				logger.error('Successful stdout is empty.', { target: cmdOptions.target });
			}

			return parseOutput(cmdResult.stdout.trim());
		} catch (error: unknown) {
			return handleCommandError('traceroute', error, parseOutput);
		}
	}
}
