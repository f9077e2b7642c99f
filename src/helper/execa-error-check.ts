import type { ExecaError } from 'execa';

export const isExecaError = (error: unknown): error is ExecaError => typeof error === 'object' && error !== null && (error as ExecaError).stderr !== undefined;
