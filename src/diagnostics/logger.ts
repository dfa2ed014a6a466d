import * as fs from 'node:fs';

export type LogLevel = 'critical' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface Logger {
	readonly name: string;
	critical(message: string, meta?: Record<string, unknown>): void;
	error(message: string, meta?: Record<string, unknown>): void;
	warn(message: string, meta?: Record<string, unknown>): void;
	info(message: string, meta?: Record<string, unknown>): void;
	debug(message: string, meta?: Record<string, unknown>): void;
	trace(message: string, meta?: Record<string, unknown>): void;
	child(name: string): Logger;
}

export interface LogSink {
	readonly level: LogLevel;
	appendLine(line: string): void;
	close?(): void;
}

/** Console verbosity: 0 = critical only, 1 = info, 2 = debug. */
export type ConsoleVerbosity = 0 | 1 | 2;

export const FRAMEWORK_LOGGER_NAME = 'mesh';

const LEVEL_ORDER: Record<LogLevel, number> = {
	critical: 0,
	error: 1,
	warn: 2,
	info: 3,
	debug: 4,
	trace: 5
};

function toLogLine(name: string, level: LogLevel, message: string, meta?: Record<string, unknown>): string {
	const timestamp = new Date().toISOString();
	if (!meta || Object.keys(meta).length === 0) {
		return `[${timestamp}] [${name}] [${level}] ${message}`;
	}

	let serialized = '';
	try {
		serialized = JSON.stringify(meta);
	} catch {
		serialized = '{"meta":"unserializable"}';
	}
	return `[${timestamp}] [${name}] [${level}] ${message} ${serialized}`;
}

export function isLevelEnabled(sinkLevel: LogLevel, level: LogLevel): boolean {
	return LEVEL_ORDER[level] <= LEVEL_ORDER[sinkLevel];
}

export class NoopLogger implements Logger {
	public constructor(public readonly name = 'noop') {}
	public critical(_message: string, _meta?: Record<string, unknown>): void {}
	public error(_message: string, _meta?: Record<string, unknown>): void {}
	public warn(_message: string, _meta?: Record<string, unknown>): void {}
	public info(_message: string, _meta?: Record<string, unknown>): void {}
	public debug(_message: string, _meta?: Record<string, unknown>): void {}
	public trace(_message: string, _meta?: Record<string, unknown>): void {}
	public child(name: string): Logger {
		return new NoopLogger(`${this.name}.${name}`);
	}
}

/**
 * Logger whose children share the sink list of the root, so re-pointing the
 * root at a new log file also redirects every device logger created from it.
 */
export class HierarchicalLogger implements Logger {
	public readonly name: string;
	private readonly sinks: LogSink[];

	public constructor(name: string = FRAMEWORK_LOGGER_NAME, sinks: LogSink[] = []) {
		this.name = name;
		this.sinks = sinks;
	}

	public addSink(sink: LogSink): void {
		this.sinks.push(sink);
	}

	public get sinkCount(): number {
		return this.sinks.length;
	}

	public detachAllSinks(): void {
		while (this.sinks.length > 0) {
			const sink = this.sinks.shift();
			sink?.close?.();
		}
	}

	public child(name: string): Logger {
		return new HierarchicalLogger(`${this.name}.${name}`, this.sinks);
	}

	public critical(message: string, meta?: Record<string, unknown>): void {
		this.log('critical', message, meta);
	}

	public error(message: string, meta?: Record<string, unknown>): void {
		this.log('error', message, meta);
	}

	public warn(message: string, meta?: Record<string, unknown>): void {
		this.log('warn', message, meta);
	}

	public info(message: string, meta?: Record<string, unknown>): void {
		this.log('info', message, meta);
	}

	public debug(message: string, meta?: Record<string, unknown>): void {
		this.log('debug', message, meta);
	}

	public trace(message: string, meta?: Record<string, unknown>): void {
		this.log('trace', message, meta);
	}

	private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
		let line: string | undefined;
		for (const sink of this.sinks) {
			if (!isLevelEnabled(sink.level, level)) {
				continue;
			}
			line ??= toLogLine(this.name, level, message, meta);
			sink.appendLine(line);
		}
	}
}

export function createLineSink(appendLine: (line: string) => void, level: LogLevel = 'info'): LogSink {
	return { level, appendLine };
}

/** Truncates (or creates) the destination and appends every line synchronously. */
export function createFileSink(destination: string, level: LogLevel = 'trace'): LogSink {
	const fd = fs.openSync(destination, 'w');
	let open = true;
	return {
		level,
		appendLine(line: string): void {
			if (open) {
				fs.writeSync(fd, `${line}\n`);
			}
		},
		close(): void {
			if (open) {
				open = false;
				fs.closeSync(fd);
			}
		}
	};
}

export function consoleLevelForVerbosity(verbosity: ConsoleVerbosity): LogLevel {
	switch (verbosity) {
		case 0:
			return 'critical';
		case 1:
			return 'info';
		default:
			return 'debug';
	}
}

/**
 * Points the framework logger at a fresh log file plus the console. Sinks
 * installed by a previous call are detached first.
 */
export function configureFrameworkLogger(
	logger: HierarchicalLogger,
	destination: string,
	verbosity: ConsoleVerbosity,
	consoleWrite: (line: string) => void = (line) => console.log(line)
): HierarchicalLogger {
	logger.detachAllSinks();
	logger.addSink(createFileSink(destination, 'trace'));
	logger.addSink(createLineSink(consoleWrite, consoleLevelForVerbosity(verbosity)));
	return logger;
}

/** Logger a device driver should publish into. */
export function getDeviceLogger(logger: Logger, deviceName: string): Logger {
	return logger.child(deviceName);
}

export function logErrorStack(logger: Logger, error: unknown): void {
	const text = error instanceof Error ? error.stack ?? `${error.name}: ${error.message}` : String(error);
	for (const line of text.split(/\r?\n/)) {
		const trimmed = line.trimEnd();
		if (trimmed.length > 0) {
			logger.error(trimmed);
		}
	}
}
