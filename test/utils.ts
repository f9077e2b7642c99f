import * as path from 'node:path';
import { readFileSync } from 'node:fs';

export const getCmdMock = (name: string): string => readFileSync(path.resolve(`./test/mocks/${name}.txt`)).toString().replace(/\r?\n$/, '');

type ExecaFailure = Error & {
	stdout: string;
	stderr: string;
	timedOut: boolean;
	shortMessage: string;
	exitCode?: number;
};

/**
 * Builds a rejection shaped like the one execa throws for a failed process.
 */
export const getExecaFailure = (fields: Partial<Omit<ExecaFailure, 'name' | 'message'>> = {}): ExecaFailure => Object.assign(new Error('Command failed with exit code 1'), {
	stdout: '',
	stderr: '',
	timedOut: false,
	shortMessage: 'Command failed with exit code 1',
	exitCode: 1,
	...fields,
});
