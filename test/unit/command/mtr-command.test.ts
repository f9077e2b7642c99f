import * as sinon from 'sinon';
import { expect } from 'chai';
import { getCmdMock, getExecaFailure } from '../../utils.js';
import { MtrCommand, argBuilder, type MtrOptions } from '../../../src/command/mtr-command.js';
import { InvalidOptionsException } from '../../../src/command/exception/invalid-options-exception.js';

describe('mtr command executor', () => {
	const sandbox = sinon.createSandbox();
	const options: MtrOptions = { type: 'mtr', target: 'dns.google', packets: 10 };

	afterEach(() => {
		sandbox.restore();
	});

	it('should request a wide report with AS numbers', () => {
		expect(argBuilder(options)).to.deep.equal([ '--report', '--report-wide', '--aslookup', '--show-ips', '-c', '10', 'dns.google' ]);
	});

	it('should run and parse mtr', async () => {
		const cmd = sandbox.stub().resolves({ stdout: getCmdMock('mtr-success') });
		const result = await new MtrCommand(cmd).run(options);

		expect(result.target).to.equal('dns.google');
		expect(result.status).to.equal('success');
		expect(result.totalHops).to.equal(3);
		expect(result.avgLatency).to.equal(7);
	});

	it('should use the configured thresholds', async () => {
		const cmd = sandbox.stub().resolves({ stdout: getCmdMock('mtr-success') });
		const result = await new MtrCommand(cmd, {
			failedLoss: 20,
			warningLoss: 5,
			warningLatency: 5,
			hopWarningLoss: 10,
			problematicHopLoss: 5,
		}).run(options);

		expect(result.status).to.equal('warning');
	});

	it('should fail with the mtr message when the target does not resolve', async () => {
		const cmd = sandbox.stub().rejects(getExecaFailure({ stderr: 'mtr: Failed to resolve host: example.invalid: Name or service not known' }));
		const result = await new MtrCommand(cmd).run({ ...options, target: 'example.invalid' });

		expect(result.status).to.equal('failed');
		expect(result.errorMessage).to.equal('mtr: Failed to resolve host: example.invalid: Name or service not known');
	});

	it('should reject a missing target', async () => {
		const rejection = await new MtrCommand(sandbox.stub()).run({ type: 'mtr', packets: 10 } as MtrOptions).catch((error: unknown) => error);

		expect(rejection).to.be.instanceOf(InvalidOptionsException);
		expect(rejection).to.have.property('message', 'invalid options for command \'mtr\': "target" is required');
	});
});
