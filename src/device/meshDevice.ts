/** Property key under which a node reports its IEEE 802.15.4 extended address. */
export const EXT_ADDRESS_PROPERTY = 'NCP:ExtendedAddress';

/**
 * Contract a device driver offers the harness. Operations are dispatched
 * without blocking; `waitForCompletion()` resolves once the device's queue is
 * idle, with an error message if any queued operation failed.
 */
export interface MeshDevice {
	readonly name: string;
	waitForCompletion(): Promise<string | undefined>;
	ping6(targetAddress: string, count: number, size: number, iface?: string): void;
	timedPing6(targetAddress: string, count: number, size: number, iface?: string): void;
	readonly ping6Sent: number;
	readonly ping6Received: number;
	/** Round-trip time of the last timed ping, in milliseconds. */
	readonly ping6RoundTripTime: number;
	get(key: string): string;
	tearDown(): Promise<void>;
}

/**
 * Capability of devices that take part in the mesh topology and are shown by
 * the visualization host.
 */
export interface NetworkVisualizable {
	readonly networkVisualizable: true;
	/** Node id the visualization host knows this device by. */
	readonly visualizationNodeId: number;
}

export type VisualizableMeshDevice = MeshDevice & NetworkVisualizable;

export function isNetworkVisualizable(device: MeshDevice): device is VisualizableMeshDevice {
	return 'networkVisualizable' in device && device.networkVisualizable === true;
}

/** Parses an extended address reported as `[0123456789abcdef]`. */
export function parseExtAddress(raw: string): bigint {
	const match = /^\s*\[([0-9a-f]{1,16})\]\s*$/i.exec(raw);
	if (!match) {
		throw new Error(`Malformed extended address "${raw}".`);
	}
	return BigInt(`0x${match[1]}`);
}
