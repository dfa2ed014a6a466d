import type { Logger } from '../diagnostics/logger';
import { errorMessage } from '../errors/HardwareError';
import type { VisualizationBridge } from '../visualization/visualizationSession';
import type { MeshDevice } from './meshDevice';

/**
 * Devices claimed by the active test class.
 *
 * `devices` is the completion barrier every phase waits on; `claimed` is all
 * hardware that must be torn down when the class ends, including devices that
 * were claimed without joining the barrier.
 */
export class DeviceRegistry {
	private readonly active: MeshDevice[] = [];
	private readonly claimed: MeshDevice[] = [];

	public constructor(
		private readonly visualization: VisualizationBridge,
		private readonly logger: () => Logger
	) {}

	public get devices(): readonly MeshDevice[] {
		return this.active;
	}

	public get claimedDevices(): readonly MeshDevice[] {
		return this.claimed;
	}

	public add(device: MeshDevice): void {
		this.claim(device);
		if (this.active.includes(device)) {
			return;
		}
		this.active.push(device);
		this.visualization.addDevice(device);
	}

	public claim(device: MeshDevice): void {
		if (!this.claimed.includes(device)) {
			this.claimed.push(device);
		}
	}

	/** Empties the barrier list, last added first. */
	public clear(): void {
		let device = this.active.pop();
		while (device) {
			this.visualization.removeDevice(device);
			device = this.active.pop();
		}
	}

	/**
	 * Tears down every claimed device in reverse claim order. A failing
	 * teardown is logged so the remaining hardware is still released; the
	 * first failure is rethrown once all devices were visited.
	 */
	public async releaseAll(): Promise<void> {
		let firstError: unknown;
		let device = this.claimed.pop();
		while (device) {
			try {
				await device.tearDown();
			} catch (error) {
				this.logger().error(`Releasing device ${device.name} failed: ${errorMessage(error)}`);
				firstError ??= error;
			}
			const index = this.active.indexOf(device);
			if (index >= 0) {
				this.active.splice(index, 1);
				this.visualization.removeDevice(device);
			}
			device = this.claimed.pop();
		}
		if (firstError !== undefined) {
			throw firstError;
		}
	}
}
