import type { Logger } from '../diagnostics/logger';

export interface SnifferStats {
	channel?: number;
	capturing: boolean;
	framesCaptured: number;
	bytesCaptured: number;
}

/**
 * Capture session bound to one radio channel. Like devices, operations are
 * dispatched and then awaited through `waitForCompletion()`.
 */
export interface SnifferHandle {
	readonly kind: string;
	readonly stats: SnifferStats;
	setLogger(logger: Logger): void;
	start(channel: number, outputPath: string): void;
	stop(): void;
	restart(): void;
	getStats(): void;
	tearDown(): void;
	waitForCompletion(): Promise<string | undefined>;
}

export interface SnifferFactory {
	readonly name: string;
	create(): Promise<SnifferHandle> | SnifferHandle;
}

/** Stand-in used when no capture hardware could be constructed. */
export class NullSniffer implements SnifferHandle {
	public readonly kind = 'null';
	private channel: number | undefined;

	public get stats(): SnifferStats {
		return { channel: this.channel, capturing: false, framesCaptured: 0, bytesCaptured: 0 };
	}

	public setLogger(_logger: Logger): void {}

	public start(channel: number, _outputPath: string): void {
		this.channel = channel;
	}

	public stop(): void {}
	public restart(): void {}
	public getStats(): void {}
	public tearDown(): void {}

	public async waitForCompletion(): Promise<string | undefined> {
		return undefined;
	}
}
