import config from 'config';
import Joi from 'joi';
import { execa } from 'execa';
import type { CommandInterface, CommandRunner } from '../types.js';
import { handleCommandError } from '../helper/command-error-handler.js';
import { InvalidOptionsException } from './exception/invalid-options-exception.js';
import parse, { type SpeedTestResult } from './handlers/speedtest/parse.js';

export type SpeedTestOptions = {
	type: 'speedtest';
};

const speedTestOptionsSchema = Joi.object<SpeedTestOptions>({
	type: Joi.string().valid('speedtest').required(),
});

export const argBuilder = (): string[] => [ '--json' ];

export const speedTestCmd: CommandRunner<SpeedTestOptions> = () => execa('speedtest-cli', argBuilder(), {
	timeout: config.get<number>('commands.speedtest.timeout') * 1000,
});

export class SpeedTestCommand implements CommandInterface<SpeedTestOptions, SpeedTestResult> {
	constructor (private readonly cmd: CommandRunner<SpeedTestOptions> = speedTestCmd) {}

	async run (options: SpeedTestOptions): Promise<SpeedTestResult> {
		const validationResult = speedTestOptionsSchema.validate(options);

		if (validationResult.error) {
			throw new InvalidOptionsException('speedtest', validationResult.error);
		}

		try {
			const cmdResult = await this.cmd(validationResult.value);
			return parse(cmdResult.stdout);
		} catch (error: unknown) {
			return handleCommandError('speedtest', error, parse);
		}
	}
}
