export type CommandOutput = {
	stdout: string;
};

export type CommandRunner<OPT> = (options: OPT) => Promise<CommandOutput>;

export type CommandInterface<OPT, RES> = {
	run(options: OPT): Promise<RES>;
};

export type ParsedOutput = {
	status: 'success' | 'warning' | 'failed';
	rawOutput: string;
	errorMessage?: string;
};
