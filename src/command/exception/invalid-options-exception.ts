import type { ValidationError } from 'joi';

export class InvalidOptionsException extends Error {
	readonly fields: string[];

	constructor (readonly command: string, error: ValidationError) {
		super();
		this.message = `invalid options for command '${command}': ${error.message}`;
		this.fields = error.details.map(detail => detail.path.join('.'));
	}
}
