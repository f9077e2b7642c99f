import config from 'config';
import Joi from 'joi';
import { execa } from 'execa';
import type { CommandInterface, CommandRunner } from '../types.js';
import { handleCommandError } from '../helper/command-error-handler.js';
import { scopedLogger } from '../lib/logger.js';
import { targetSchema } from '../lib/targets.js';
import { DEFAULT_THRESHOLDS, type MtrThresholds } from '../lib/thresholds.js';
import { InvalidOptionsException } from './exception/invalid-options-exception.js';
import MtrParser from './handlers/mtr/parser.js';
import type { MtrResult } from './handlers/mtr/types.js';

export type MtrOptions = {
	type: 'mtr';
	target: string;
	packets: number;
};

const logger = scopedLogger('mtr-command');

const mtrOptionsSchema = Joi.object<MtrOptions>({
	type: Joi.string().valid('mtr').required(),
	target: targetSchema.required(),
	packets: Joi.number().integer().min(1).max(100).default(10),
});

export const argBuilder = (options: MtrOptions): string[] => {
	const args = [
		// Report mode, wide hostnames
		[ '--report', '--report-wide' ],
		// AS numbers and both names and addresses
		[ '--aslookup', '--show-ips' ],
		[ '-c', String(options.packets) ],
		options.target,
	].flat();

	return args;
};

export const mtrCmd: CommandRunner<MtrOptions> = (options: MtrOptions) => {
	const args = argBuilder(options);
	return execa('mtr', args, { timeout: config.get<number>('commands.mtr.timeout') * 1000 });
};

export class MtrCommand implements CommandInterface<MtrOptions, MtrResult> {
	constructor (
		private readonly cmd: CommandRunner<MtrOptions> = mtrCmd,
		private readonly thresholds: MtrThresholds = DEFAULT_THRESHOLDS.mtr,
	) {}

	async run (options: MtrOptions): Promise<MtrResult> {
		const validationResult = mtrOptionsSchema.validate(options);

		if (validationResult.error) {
			throw new InvalidOptionsException('mtr', validationResult.error);
		}

		const { value: cmdOptions } = validationResult;
		const parseOutput = (output: string) => MtrParser.parse(output, cmdOptions.target, this.thresholds);

		try {
			const cmdResult = await this.cmd(cmdOptions);

			if (cmdResult.stdout.startsWith('mtr:')) {
				logger.warn('mtr reported an error.', { target: cmdOptions.target, output: cmdResult.stdout });
			}

			return parseOutput(cmdResult.stdout);
		} catch (error: unknown) {
			return handleCommandError('mtr', error, parseOutput);
		}
	}
}
