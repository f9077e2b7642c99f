import config from 'config';
import Joi from 'joi';
import _ from 'lodash';
import { ConfigurationException } from './exception/configuration-exception.js';

export type PingThresholds = {
	warningLoss: number;
};

export type TracerouteThresholds = {
	maxHops: number;
};

export type MtrThresholds = {
	failedLoss: number;
	warningLoss: number;
	warningLatency: number;
	hopWarningLoss: number;
	problematicHopLoss: number;
};

export type Thresholds = {
	ping: PingThresholds;
	traceroute: TracerouteThresholds;
	mtr: MtrThresholds;
};

export const DEFAULT_THRESHOLDS: Thresholds = {
	ping: {
		warningLoss: 50,
	},
	traceroute: {
		maxHops: 30,
	},
	mtr: {
		failedLoss: 20,
		warningLoss: 5,
		warningLatency: 200,
		hopWarningLoss: 10,
		problematicHopLoss: 5,
	},
};

const percent = Joi.number().min(0).max(100).required();

const thresholdsSchema = Joi.object<Thresholds>({
	ping: Joi.object({
		warningLoss: percent,
	}),
	traceroute: Joi.object({
		maxHops: Joi.number().integer().min(1).required(),
	}),
	mtr: Joi.object({
		failedLoss: percent,
		warningLoss: percent,
		warningLatency: Joi.number().min(0).required(),
		hopWarningLoss: percent,
		problematicHopLoss: percent,
	}),
});

export const resolveThresholds = (overrides: unknown): Thresholds => {
	const merged: unknown = _.merge({}, DEFAULT_THRESHOLDS, overrides);
	const { error, value } = thresholdsSchema.validate(merged);

	if (error) {
		throw new ConfigurationException('thresholds', error.message);
	}

	return value;
};

export const loadThresholds = (): Thresholds => resolveThresholds(config.has('thresholds') ? config.get<unknown>('thresholds') : {});
