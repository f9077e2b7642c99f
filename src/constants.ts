import * as fs from 'node:fs';

// The package file sits one level up from src/ and two from dist/src/.
const packageFile = [ '../package.json', '../../package.json' ]
	.map(relative => new URL(relative, import.meta.url))
	.find(url => fs.existsSync(url));

const pkg: { version: string } = packageFile ? JSON.parse(fs.readFileSync(packageFile).toString()) as never : { version: '0.0.0' };

export const VERSION = pkg.version;
