export class ConfigurationException extends Error {
	constructor (readonly setting: string, reason: string) {
		super();
		this.message = `invalid configuration for '${setting}': ${reason}`;
	}
}
