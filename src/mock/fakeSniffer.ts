import type { Logger } from '../diagnostics/logger';
import type { SnifferFactory, SnifferHandle, SnifferStats } from '../sniffer/snifferHandle';

export class FakeSniffer implements SnifferHandle {
	public readonly kind = 'fake';
	public readonly calls: string[] = [];
	public logger?: Logger;

	private channel?: number;
	private capturing = false;

	public get stats(): SnifferStats {
		return { channel: this.channel, capturing: this.capturing, framesCaptured: 0, bytesCaptured: 0 };
	}

	public setLogger(logger: Logger): void {
		this.logger = logger;
		this.calls.push('setLogger');
	}

	public start(channel: number, outputPath: string): void {
		this.channel = channel;
		this.capturing = true;
		this.calls.push(`start ${channel} ${outputPath}`);
	}

	public stop(): void {
		this.capturing = false;
		this.calls.push('stop');
	}

	public restart(): void {
		this.capturing = true;
		this.calls.push('restart');
	}

	public getStats(): void {
		this.calls.push('getStats');
	}

	public tearDown(): void {
		this.calls.push('tearDown');
	}

	public async waitForCompletion(): Promise<string | undefined> {
		this.calls.push('wait');
		return undefined;
	}
}

/** Factory handing out fresh fake sniffers and remembering them. */
export function createFakeSnifferFactory(created: FakeSniffer[] = []): SnifferFactory & { created: FakeSniffer[] } {
	return {
		name: 'fake',
		created,
		create(): SnifferHandle {
			const sniffer = new FakeSniffer();
			created.push(sniffer);
			return sniffer;
		}
	};
}

export function createFailingSnifferFactory(name: string, message: string): SnifferFactory {
	return {
		name,
		create(): SnifferHandle {
			throw new Error(message);
		}
	};
}
