import { TaskQueue } from '../device/taskQueue';
import type { MeshDevice, NetworkVisualizable } from '../device/meshDevice';

export interface FakePingResult {
	sent: number;
	received: number;
	roundTripTimeMs?: number;
}

export type FakePingResponder = (targetAddress: string, count: number) => FakePingResult | Error;

export interface FakePingCall {
	kind: 'ping6' | 'timedPing6';
	targetAddress: string;
	count: number;
	size: number;
	iface?: string;
}

export interface FakeMeshDeviceOptions {
	name: string;
	responder?: FakePingResponder;
	properties?: Record<string, string>;
	tearDownError?: Error;
}

const allReplies: FakePingResponder = (_targetAddress, count) => ({ sent: count, received: count, roundTripTimeMs: 1 });

/**
 * In-process device for dry runs and harness tests. Pings resolve through a
 * responder; returning an `Error` makes the queued operation fail.
 */
export class FakeMeshDevice implements MeshDevice {
	public readonly name: string;
	public readonly pingCalls: FakePingCall[] = [];
	public tearDownCount = 0;
	public ping6Sent = 0;
	public ping6Received = 0;
	public ping6RoundTripTime = 0;

	private readonly queue = new TaskQueue();
	private readonly responder: FakePingResponder;
	private readonly properties: Record<string, string>;
	private readonly tearDownError?: Error;

	public constructor(options: FakeMeshDeviceOptions) {
		this.name = options.name;
		this.responder = options.responder ?? allReplies;
		this.properties = { ...options.properties };
		this.tearDownError = options.tearDownError;
	}

	public ping6(targetAddress: string, count: number, size: number, iface?: string): void {
		this.pingCalls.push({ kind: 'ping6', targetAddress, count, size, iface });
		this.queue.enqueue(`${this.name} ping6 ${targetAddress}`, () => this.applyPing(targetAddress, count));
	}

	public timedPing6(targetAddress: string, count: number, size: number, iface?: string): void {
		this.pingCalls.push({ kind: 'timedPing6', targetAddress, count, size, iface });
		this.queue.enqueue(`${this.name} timed ping6 ${targetAddress}`, () => this.applyPing(targetAddress, count));
	}

	/** Queues an operation that fails with `message`. */
	public failNext(message: string): void {
		this.queue.enqueue(this.name, () => {
			throw new Error(message);
		});
	}

	public waitForCompletion(): Promise<string | undefined> {
		return this.queue.waitForCompletion();
	}

	public get(key: string): string {
		const value = this.properties[key];
		if (value === undefined) {
			throw new Error(`${this.name} has no property "${key}".`);
		}
		return value;
	}

	public async tearDown(): Promise<void> {
		this.tearDownCount += 1;
		if (this.tearDownError) {
			throw this.tearDownError;
		}
	}

	private applyPing(targetAddress: string, count: number): void {
		const result = this.responder(targetAddress, count);
		if (result instanceof Error) {
			this.ping6Sent = 0;
			this.ping6Received = 0;
			throw result;
		}
		this.ping6Sent = result.sent;
		this.ping6Received = result.received;
		this.ping6RoundTripTime = result.roundTripTimeMs ?? 0;
	}
}

export class FakeVisualizableDevice extends FakeMeshDevice implements NetworkVisualizable {
	public readonly networkVisualizable = true as const;

	public constructor(
		options: FakeMeshDeviceOptions,
		public readonly visualizationNodeId: number
	) {
		super(options);
	}
}
