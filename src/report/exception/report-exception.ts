export class ReportException extends Error {
	constructor (readonly destination: string, reason: string) {
		super();
		this.message = `failed to write '${destination}': ${reason}`;
	}
}
