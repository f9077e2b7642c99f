import Joi from 'joi';
import _ from 'lodash';

export type TargetKind = 'ipv4' | 'ipv6' | 'hostname';

export type TargetValidation = {
	valid: string[];
	errors: string[];
};

const ipv4Schema = Joi.string().ip({ version: [ 'ipv4' ], cidr: 'forbidden' });
const ipv6Schema = Joi.string().ip({ version: [ 'ipv6' ], cidr: 'forbidden' });
const hostnameSchema = Joi.string().domain({ minDomainSegments: 1, tlds: false });

export const targetSchema = Joi.string().trim().max(253).custom((value: string, helpers) => {
	if (getTargetKind(value)) {
		return value;
	}

	return helpers.error('any.invalid');
});

export function getTargetKind (target: string): TargetKind | undefined {
	if (!ipv4Schema.validate(target).error) {
		return 'ipv4';
	}

	if (!ipv6Schema.validate(target).error) {
		return 'ipv6';
	}

	if (!hostnameSchema.validate(target).error) {
		return 'hostname';
	}

	return undefined;
}

export function validateTargets (targets: string[]): TargetValidation {
	if (targets.length === 0) {
		return { valid: [], errors: [ 'Target list cannot be empty' ] };
	}

	const result: TargetValidation = { valid: [], errors: [] };

	for (const [ index, target ] of targets.entries()) {
		const { error, value } = targetSchema.validate(target);

		if (error || typeof value !== 'string') {
			result.errors.push(`Target ${index + 1}: '${target}' is not a valid IP address or hostname`);
			continue;
		}

		result.valid.push(value);
	}

	return result;
}

/**
 * Validated targets without repeats. Entries are compared after trimming.
 */
export function resolveTargets (targets: string[]): TargetValidation {
	const { valid, errors } = validateTargets(targets);
	return { valid: _.uniq(valid), errors };
}
