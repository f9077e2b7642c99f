import { expect } from 'chai';
import { getCmdMock } from '../../utils.js';
import parse, { getPingStatus } from '../../../src/command/handlers/ping/parse.js';

describe('ping parser', () => {
	it('should parse iputils output', () => {
		const rawOutput = getCmdMock('ping-success-linux');
		const result = parse(rawOutput, '8.8.8.8');

		expect(result).to.deep.equal({
			target: '8.8.8.8',
			status: 'success',
			packetsSent: 4,
			packetsReceived: 4,
			packetLossPercent: 0,
			minTime: 10,
			avgTime: 12.5,
			maxTime: 15,
			mdevTime: 1.2,
			rawOutput,
		});
	});

	it('should parse BSD round-trip output', () => {
		const result = parse(getCmdMock('ping-success-mac'), '1.1.1.1');

		expect(result.status).to.equal('success');
		expect(result.packetsSent).to.equal(4);
		expect(result.packetsReceived).to.equal(4);
		expect(result.packetLossPercent).to.equal(0);
		expect(result.minTime).to.equal(8.512);
		expect(result.avgTime).to.equal(9.125);
		expect(result.maxTime).to.equal(10.04);
		expect(result.mdevTime).to.equal(0.561);
	});

	it('should parse Portuguese statistics', () => {
		const result = parse(getCmdMock('ping-success-pt'), '9.9.9.9');

		expect(result.status).to.equal('success');
		expect(result.packetsSent).to.equal(4);
		expect(result.packetsReceived).to.equal(3);
		expect(result.packetLossPercent).to.equal(25);
		expect(result.avgTime).to.equal(20.3);
	});

	it('should mark a run with every packet lost as failed', () => {
		const result = parse(getCmdMock('ping-timeout-linux'), '10.255.255.1');

		expect(result.status).to.equal('failed');
		expect(result.packetsSent).to.equal(4);
		expect(result.packetsReceived).to.equal(0);
		expect(result.packetLossPercent).to.equal(100);
		expect(result.avgTime).to.equal(0);
		expect(result.errorMessage).to.be.undefined;
	});

	it('should mark heavy packet loss as warning', () => {
		const result = parse(getCmdMock('ping-packet-loss-linux'), '203.0.113.10');

		expect(result.status).to.equal('warning');
		expect(result.packetsSent).to.equal(6);
		expect(result.packetsReceived).to.equal(2);
		expect(result.packetLossPercent).to.equal(66.6667);
		expect(result.avgTime).to.equal(50);
	});

	it('should apply custom thresholds', () => {
		const result = parse(getCmdMock('ping-packet-loss-linux'), '203.0.113.10', { warningLoss: 70 });
		expect(result.status).to.equal('success');
	});

	it('should cap received packets at the transmitted count', () => {
		const result = parse('4 packets transmitted, 6 received, 0% packet loss, time 3004ms', '8.8.8.8');

		expect(result.packetsSent).to.equal(4);
		expect(result.packetsReceived).to.equal(4);
	});

	it('should succeed with zero counts when only the rtt line is present', () => {
		const result = parse('rtt min/avg/max/mdev = 1.000/2.000/3.000/0.500 ms', '8.8.8.8');

		expect(result.status).to.equal('success');
		expect(result.packetsSent).to.equal(0);
		expect(result.packetsReceived).to.equal(0);
		expect(result.packetLossPercent).to.equal(0);
		expect(result.avgTime).to.equal(2);
	});

	it('should fail on empty output', () => {
		const result = parse('', '8.8.8.8');

		expect(result.status).to.equal('failed');
		expect(result.packetsSent).to.equal(0);
		expect(result.packetsReceived).to.equal(0);
		expect(result.rawOutput).to.equal('');
	});

	it('should fail on unrelated output', () => {
		const result = parse('ping: example.invalid: Name or service not known', 'example.invalid');
		expect(result.status).to.equal('failed');
	});

	it('should return a failed result when a value cannot be read', () => {
		const rawOutput = [
			'4 packets transmitted, 4 received, 0% packet loss, time 3004ms',
			'rtt min/avg/max/mdev = 1.2.3/2.000/3.000/0.500 ms',
		].join('\n');

		expect(parse(rawOutput, '8.8.8.8')).to.deep.equal({
			target: '8.8.8.8',
			status: 'failed',
			packetsSent: 0,
			packetsReceived: 0,
			packetLossPercent: 100,
			minTime: 0,
			avgTime: 0,
			maxTime: 0,
			mdevTime: 0,
			rawOutput,
			errorMessage: 'invalid numeric value \'1.2.3\' for rtt min',
		});
	});

	it('should return the same result for the same input', () => {
		const rawOutput = getCmdMock('ping-success-pt');
		expect(parse(rawOutput, '9.9.9.9')).to.deep.equal(parse(rawOutput, '9.9.9.9'));
	});

	describe('status', () => {
		const thresholds = { warningLoss: 50 };
		const rtt = { min: 1, avg: 2, max: 3, mdev: 0.5 };

		it('should be failed without statistics and rtt', () => {
			expect(getPingStatus(undefined, undefined, thresholds)).to.equal('failed');
		});

		it('should be failed when nothing was transmitted', () => {
			expect(getPingStatus({ total: 0, rcv: 0, loss: 0 }, undefined, thresholds)).to.equal('failed');
		});

		it('should be warning only above the loss threshold', () => {
			expect(getPingStatus({ total: 4, rcv: 2, loss: 50 }, rtt, thresholds)).to.equal('success');
			expect(getPingStatus({ total: 10, rcv: 4, loss: 60 }, rtt, thresholds)).to.equal('warning');
		});

		it('should be failed at full loss', () => {
			expect(getPingStatus({ total: 4, rcv: 0, loss: 100 }, undefined, thresholds)).to.equal('failed');
		});
	});
});
