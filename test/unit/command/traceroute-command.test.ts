import * as sinon from 'sinon';
import { expect } from 'chai';
import { getCmdMock, getExecaFailure } from '../../utils.js';
import { TracerouteCommand, argBuilder, type TraceOptions } from '../../../src/command/traceroute-command.js';
import { InvalidOptionsException } from '../../../src/command/exception/invalid-options-exception.js';
import { TIMEOUT_MESSAGE } from '../../../src/helper/command-error-handler.js';

describe('trace command', () => {
	const sandbox = sinon.createSandbox();
	const options: TraceOptions = { type: 'traceroute', target: '8.8.8.8', maxHops: 30, wait: 5 };

	afterEach(() => {
		sandbox.restore();
	});

	it('should build numeric traceroute arguments', () => {
		expect(argBuilder({ ...options, maxHops: 20, wait: 2 })).to.deep.equal([ '-n', '-m', '20', '-w', '2', '8.8.8.8' ]);
	});

	it('should run and parse trace', async () => {
		const cmd = sandbox.stub().resolves({ stdout: `${getCmdMock('traceroute-success')}\n` });
		const result = await new TracerouteCommand(cmd).run(options);

		expect(result.status).to.equal('success');
		expect(result.totalHops).to.equal(5);
		expect(result.rawOutput).to.equal(getCmdMock('traceroute-success'));
	});

	it('should keep the hops printed before a timeout', async () => {
		const cmd = sandbox.stub().rejects(getExecaFailure({ stdout: getCmdMock('traceroute-hostnames'), timedOut: true }));
		const result = await new TracerouteCommand(cmd).run({ ...options, target: 'example.com' });

		expect(result.totalHops).to.equal(3);
		expect(result.errorMessage).to.equal(TIMEOUT_MESSAGE);
	});

	it('should fail when traceroute is missing', async () => {
		const cmd = sandbox.stub().rejects(new Error('spawn traceroute ENOENT'));
		const result = await new TracerouteCommand(cmd).run(options);

		expect(result.status).to.equal('failed');
		expect(result.hops).to.deep.equal([]);
		expect(result.errorMessage).to.equal('spawn traceroute ENOENT');
	});

	it('should reject a hop limit out of range', async () => {
		const rejection = await new TracerouteCommand(sandbox.stub()).run({ ...options, maxHops: 300 }).catch((error: unknown) => error);

		expect(rejection).to.be.instanceOf(InvalidOptionsException);
		expect(rejection).to.have.deep.property('fields', [ 'maxHops' ]);
	});
});
