import config from 'config';
import Joi from 'joi';
import { execa } from 'execa';
import type { CommandInterface, CommandRunner } from '../types.js';
import { handleCommandError } from '../helper/command-error-handler.js';
import { scopedLogger } from '../lib/logger.js';
import { targetSchema } from '../lib/targets.js';
import { DEFAULT_THRESHOLDS, type PingThresholds } from '../lib/thresholds.js';
import { InvalidOptionsException } from './exception/invalid-options-exception.js';
import parse, { type PingResult } from './handlers/ping/parse.js';

export type PingOptions = {
	type: 'ping';
	target: string;
	packets: number;
	deadline: number;
};

const pingOptionsSchema = Joi.object<PingOptions>({
	type: Joi.string().valid('ping').required(),
	target: targetSchema.required(),
	packets: Joi.number().integer().min(1).max(100).default(4),
	deadline: Joi.number().integer().min(1).default(10),
});

const logger = scopedLogger('ping-command');

export const argBuilder = (options: PingOptions): string[] => {
	const args = [
		[ '-c', options.packets.toString() ],
		[ '-w', options.deadline.toString() ],
		options.target,
	].flat();

	return args;
};

export const pingCmd: CommandRunner<PingOptions> = (options: PingOptions) => {
	const args = argBuilder(options);
	return execa('ping', args, { timeout: config.get<number>('commands.ping.timeout') * 1000 });
};

export class PingCommand implements CommandInterface<PingOptions, PingResult> {
	constructor (
		private readonly cmd: CommandRunner<PingOptions> = pingCmd,
		private readonly thresholds: PingThresholds = DEFAULT_THRESHOLDS.ping,
	) {}

	async run (options: PingOptions): Promise<PingResult> {
		const validationResult = pingOptionsSchema.validate(options);

		if (validationResult.error) {
			throw new InvalidOptionsException('ping', validationResult.error);
		}

		const { value: cmdOptions } = validationResult;
		const parseOutput = (output: string) => parse(output, cmdOptions.target, this.thresholds);

		try {
			const cmdResult = await this.cmd(cmdOptions);

			if (cmdResult.stdout.length === 0) {
				logger.error('Successful stdout is empty.', { target: cmdOptions.target });
			}

			return parseOutput(cmdResult.stdout);
		} catch (error: unknown) {
			return handleCommandError('ping', error, parseOutput);
		}
	}
}
