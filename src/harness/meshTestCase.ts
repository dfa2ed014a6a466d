import type { Logger } from '../diagnostics/logger';
import type { MeshDevice } from '../device/meshDevice';
import type { TrackingId } from '../results/resultLedger';
import type { SnifferStats } from '../sniffer/snifferHandle';
import {
	ping6,
	ping6MultiDest,
	ping6MultiSource,
	timedPing6,
	waitForDevices,
	type MultiSourcePingOptions,
	type PingOptions
} from './pingAssertions';
import type { HarnessRunContext } from './runContext';

export interface StressTestOptions {
	iterations: number;
	allowedFailures?: number;
}

/**
 * Base fixture for mesh hardware tests.
 *
 * Subclasses override the lifecycle hooks and add `test*` methods; one
 * instance serves the whole class, so instance fields hold class-wide state
 * such as the claimed boards.
 *
 * ```ts
 * class TwoNodePing extends MeshTestCase {
 *   static trackingIds = { suite_id: 'S12', testPingRouter: 'C301' };
 *   static stressTests = { testPingRouter: { iterations: 20, allowedFailures: 2 } };
 *
 *   private readonly leader = claimBoard('leader');
 *
 *   async setUpClass() { this.addTestDevice(this.leader); }
 *   async testPingRouter() { await this.ping6(this.leader, 'fd00::1', 10); }
 * }
 * ```
 */
export abstract class MeshTestCase {
	/** Ids in the external test-management system, by method name or `suite_id`. */
	public static trackingIds?: Readonly<Record<string, TrackingId>>;
	/** Methods to run repeatedly with a tolerated failure count. */
	public static stressTests?: Readonly<Record<string, StressTestOptions>>;

	public constructor(protected readonly context: HarnessRunContext) {}

	protected get logger(): Logger {
		return this.context.logger;
	}

	protected get deviceList(): readonly MeshDevice[] {
		return this.context.devices.devices;
	}

	protected get outputDirectory(): string {
		return this.context.requireOutputDirectory();
	}

	public setUpClass(): Promise<void> | void {}
	public setUp(): Promise<void> | void {}
	public tearDown(): Promise<void> | void {}
	public tearDownClass(): Promise<void> | void {}

	protected addTestDevice(device: MeshDevice): void {
		this.context.devices.add(device);
	}

	protected claimDevice(device: MeshDevice): void {
		this.context.devices.claim(device);
	}

	protected clearTestDevices(): void {
		this.context.devices.clear();
	}

	protected releaseDevices(): Promise<void> {
		return this.context.devices.releaseAll();
	}

	protected getDeviceExtAddress(device: MeshDevice): void {
		this.context.visualization.reportExtAddress(device);
	}

	protected waitForCompletion(devices: readonly MeshDevice[] = this.deviceList): Promise<void> {
		return waitForDevices(devices);
	}

	protected async snifferInit(channel: number): Promise<void> {
		await this.context.sniffers.init(channel);
	}

	protected snifferStart(channel: number): Promise<void> {
		return this.context.sniffers.start(channel, this.outputDirectory);
	}

	protected snifferStop(channel: number): Promise<void> {
		return this.context.sniffers.stop(channel);
	}

	protected snifferRestart(channel: number): Promise<void> {
		return this.context.sniffers.restart(channel);
	}

	protected snifferGetStats(channel: number): Promise<SnifferStats | undefined> {
		return this.context.sniffers.getStats(channel);
	}

	protected snifferTearDown(channel: number): Promise<void> {
		return this.context.sniffers.tearDown(channel);
	}

	protected ping6(sender: MeshDevice, targetAddress: string, numPings: number, options?: PingOptions): Promise<void> {
		return ping6(this.context, sender, targetAddress, numPings, options);
	}

	protected timedPing6(
		sender: MeshDevice,
		targetAddress: string,
		numPings: number,
		options?: Pick<PingOptions, 'pingSize' | 'interface'>
	): Promise<number> {
		return timedPing6(this.context, sender, targetAddress, numPings, options);
	}

	protected ping6MultiDest(
		sender: MeshDevice,
		targetAddresses: readonly string[],
		numPings: number,
		options?: PingOptions
	): Promise<void> {
		return ping6MultiDest(this.context, sender, targetAddresses, numPings, options);
	}

	protected ping6MultiSource(
		senders: readonly MeshDevice[],
		targetAddress: string,
		numPings: number,
		options?: MultiSourcePingOptions
	): Promise<void> {
		return ping6MultiSource(this.context, senders, targetAddress, numPings, options);
	}
}

export interface MeshTestCaseClass<T extends MeshTestCase = MeshTestCase> {
	new (context: HarnessRunContext): T;
	readonly name: string;
	readonly prototype: T;
	readonly trackingIds?: Readonly<Record<string, TrackingId>>;
	readonly stressTests?: Readonly<Record<string, StressTestOptions>>;
}

/**
 * Methods named `test*` on the fixture's prototype chain, base classes first,
 * each in declaration order.
 */
export function discoverTestMethods(testClass: MeshTestCaseClass): string[] {
	const chain: object[] = [];
	let proto: object | null = testClass.prototype;
	while (proto && proto !== MeshTestCase.prototype && proto !== Object.prototype) {
		chain.unshift(proto);
		proto = Object.getPrototypeOf(proto);
	}

	const names: string[] = [];
	for (const entry of chain) {
		for (const name of Object.getOwnPropertyNames(entry)) {
			if (!name.startsWith('test') || names.includes(name)) {
				continue;
			}
			if (typeof Object.getOwnPropertyDescriptor(entry, name)?.value === 'function') {
				names.push(name);
			}
		}
	}
	return names;
}
