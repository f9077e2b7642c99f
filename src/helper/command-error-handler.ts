import type { ParsedOutput } from '../types.js';
import { errorMessage } from '../command/handlers/shared.js';
import { scopedLogger } from '../lib/logger.js';
import { isExecaError } from './execa-error-check.js';

const logger = scopedLogger('command-error-handler');

export const TIMEOUT_MESSAGE = 'The measurement command timed out.';

/**
 * Turns a rejected command into a parsed result. Whatever stdout the process
 * managed to print is still handed to the parser.
 */
export const handleCommandError = <RES extends ParsedOutput>(command: string, error: unknown, parseOutput: (output: string) => RES): RES => {
	if (isExecaError(error)) {
		const stdout = error.stdout.toString();
		const result = parseOutput(stdout);

		if (error.timedOut) {
			logger.warn(`${command} timed out.`);
			return { ...result, errorMessage: TIMEOUT_MESSAGE };
		}

		// Empty stdout: report what the process printed, not the parser error.
		if (result.status === 'failed' && (!result.errorMessage || !stdout.trim())) {
			return { ...result, errorMessage: error.stderr.toString().trim() || error.shortMessage };
		}

		return result;
	}

	logger.error(`Failed to run ${command}.`, error);

	return { ...parseOutput(''), errorMessage: errorMessage(error) };
};
