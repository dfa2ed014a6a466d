import type { Logger } from '../diagnostics/logger';
import { errorMessage } from '../errors/HardwareError';
import { NullSniffer, type SnifferFactory, type SnifferHandle, type SnifferStats } from './snifferHandle';

/**
 * Capture sessions keyed by radio channel. Every per-channel operation is a
 * no-op for a channel that was never initialized.
 */
export class SnifferRegistry {
	private readonly sniffers = new Map<number, SnifferHandle>();

	public constructor(
		private readonly factories: readonly SnifferFactory[],
		private readonly logger: () => Logger
	) {}

	public channels(): number[] {
		return [...this.sniffers.keys()];
	}

	public get(channel: number): SnifferHandle | undefined {
		return this.sniffers.get(channel);
	}

	public reset(): void {
		this.sniffers.clear();
	}

	public async init(channel: number): Promise<SnifferHandle> {
		const existing = this.sniffers.get(channel);
		if (existing) {
			return existing;
		}

		let sniffer: SnifferHandle | undefined;
		for (const factory of this.factories) {
			try {
				sniffer = await factory.create();
				break;
			} catch (error) {
				this.logger().warn(`Sniffer type ${factory.name} unavailable for channel ${channel}: ${errorMessage(error)}`);
			}
		}

		if (!sniffer) {
			this.logger().debug(`No more sniffers for channel ${channel}`);
			sniffer = new NullSniffer();
		}

		this.sniffers.set(channel, sniffer);
		sniffer.setLogger(this.logger());
		await this.settle(channel, sniffer);
		return sniffer;
	}

	public async start(channel: number, outputPath: string): Promise<void> {
		const sniffer = this.sniffers.get(channel);
		if (!sniffer) {
			return;
		}
		this.logger().debug(`Starting sniffer on channel ${channel}`);
		sniffer.start(channel, outputPath);
		await this.settle(channel, sniffer);
	}

	public async stop(channel: number): Promise<void> {
		const sniffer = this.sniffers.get(channel);
		if (!sniffer) {
			return;
		}
		this.logger().debug(`Stopping sniffer on channel ${channel}`);
		sniffer.stop();
		await this.settle(channel, sniffer);
	}

	public async restart(channel: number): Promise<void> {
		const sniffer = this.sniffers.get(channel);
		if (!sniffer) {
			return;
		}
		sniffer.restart();
		await this.settle(channel, sniffer);
	}

	public async getStats(channel: number): Promise<SnifferStats | undefined> {
		const sniffer = this.sniffers.get(channel);
		if (!sniffer) {
			return undefined;
		}
		sniffer.getStats();
		await this.settle(channel, sniffer);
		return sniffer.stats;
	}

	public async tearDown(channel: number): Promise<void> {
		const sniffer = this.sniffers.get(channel);
		if (!sniffer) {
			return;
		}
		sniffer.tearDown();
		await this.settle(channel, sniffer);
	}

	public async startAll(outputPath: string): Promise<void> {
		for (const channel of this.channels()) {
			await this.start(channel, outputPath);
		}
	}

	public async stopAll(): Promise<void> {
		for (const channel of this.channels()) {
			await this.stop(channel);
		}
	}

	/** Stops and tears down every session, then forgets them. */
	public async tearDownAll(): Promise<void> {
		for (const channel of this.channels()) {
			await this.stop(channel);
			await this.tearDown(channel);
		}
		this.sniffers.clear();
	}

	private async settle(channel: number, sniffer: SnifferHandle): Promise<void> {
		const error = await sniffer.waitForCompletion();
		if (error !== undefined) {
			this.logger().warn(`Sniffer on channel ${channel}: ${error}`);
		}
	}
}
