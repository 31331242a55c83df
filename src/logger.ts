import { format } from 'date-fns';
import { color, white } from 'console-log-colors';

class Logger {
	private isDev: boolean;
	private scope: string | null;

	constructor(scope?: string) {
		this.isDev = process.env['ENVIRONMENT'] === 'development';
		this.scope = scope ?? null;
	}

	private write(message: string) {
		const timestamp = format(new Date(), 'dd-MM-yyyy HH:mm.ss.SSS');
		const coloredTimestamp = white.bold(`${timestamp}`);
		const prefix = this.scope ? `[${white.bold(this.scope)}] ` : '';
		console.log(`${coloredTimestamp} - ${prefix}${message}`);
	}

	log(message: string) {
		this.write(message);
	}

	warn(message: string) {
		this.write(color.yellow(message));
	}

	error(message: string) {
		this.write(color.red.bold(message));
	}

	// Request-level detail, development only
	logDev(message: string) {
		if (!this.isDev) return;
		this.write(color.gray(message));
	}
}

export default Logger;
