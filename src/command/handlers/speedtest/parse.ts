import Joi from 'joi';
import { type TestStatus, errorMessage } from '../shared.js';

export type SpeedTestResult = {
	status: TestStatus;
	downloadSpeed: number;
	uploadSpeed: number;
	pingLatency: number;
	serverName: string;
	serverLocation: string;
	rawOutput: string;
	errorMessage?: string;
};

type SpeedtestCliOutput = {
	download: number;
	upload: number;
	ping: number;
	server: {
		name: string;
		country: string;
	};
};

const outputSchema = Joi.object<SpeedtestCliOutput>({
	download: Joi.number().min(0).default(0),
	upload: Joi.number().min(0).default(0),
	ping: Joi.number().min(0).default(0),
	server: Joi.object({
		name: Joi.string().allow('').default(''),
		country: Joi.string().allow('').default(''),
	}).unknown(true).default(),
}).unknown(true);

const BITS_PER_MEGABIT = 1_000_000;

export default function parse (rawOutput: string): SpeedTestResult {
	try {
		const { error, value } = outputSchema.validate(JSON.parse(rawOutput));

		if (error) {
			throw error;
		}

		const downloadSpeed = value.download / BITS_PER_MEGABIT;

		return {
			status: downloadSpeed > 0 ? 'success' : 'warning',
			downloadSpeed,
			uploadSpeed: value.upload / BITS_PER_MEGABIT,
			pingLatency: value.ping,
			serverName: value.server.name,
			serverLocation: value.server.country,
			rawOutput,
		};
	} catch (error: unknown) {
		return {
			status: 'failed',
			downloadSpeed: 0,
			uploadSpeed: 0,
			pingLatency: 0,
			serverName: '',
			serverLocation: '',
			rawOutput,
			errorMessage: errorMessage(error),
		};
	}
}
