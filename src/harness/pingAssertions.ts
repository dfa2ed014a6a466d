import assert from 'node:assert/strict';
import type { MeshDevice } from '../device/meshDevice';
import type { HarnessRunContext } from './runContext';

export const DEFAULT_PING_SIZE = 32;

export interface PingOptions {
	pingSize?: number;
	/** Tolerated distance between received and expected replies. */
	allowedErrors?: number;
	/** Replies expected; defaults to the number of pings sent. */
	numExpected?: number;
	interface?: string;
}

export interface MultiSourcePingOptions extends PingOptions {
	/** Pause after each dispatch; defaults to the configured settle delay. */
	settleMs?: number;
}

/** Waits on every device in order and fails with the first error reported. */
export async function waitForDevices(devices: readonly MeshDevice[]): Promise<void> {
	for (const device of devices) {
		const error = await device.waitForCompletion();
		if (error !== undefined) {
			assert.fail(error);
		}
	}
}

function withSender(devices: readonly MeshDevice[], sender: MeshDevice): readonly MeshDevice[] {
	return devices.includes(sender) ? devices : [...devices, sender];
}

function withinTolerance(received: number, expected: number, allowedErrors: number): boolean {
	return received >= expected - allowedErrors && received <= expected + allowedErrors;
}

export async function ping6(
	context: HarnessRunContext,
	sender: MeshDevice,
	targetAddress: string,
	numPings: number,
	options: PingOptions = {}
): Promise<void> {
	const allowedErrors = options.allowedErrors ?? 0;
	const numExpected = options.numExpected ?? numPings;

	sender.ping6(targetAddress, numPings, options.pingSize ?? DEFAULT_PING_SIZE, options.interface);
	await waitForDevices(withSender(context.devices.devices, sender));

	context.recordPing({ sent: sender.ping6Sent, received: sender.ping6Received });
	context.logger.info(`Pings sent: ${sender.ping6Sent}`);
	context.logger.info(`Pings received: ${sender.ping6Received}`);

	assert.equal(sender.ping6Sent, numPings, `${sender.name} sent ${sender.ping6Sent} of ${numPings} pings`);
	assert.ok(
		withinTolerance(sender.ping6Received, numExpected, allowedErrors),
		`${sender.name} received ${sender.ping6Received} replies, expected ${numExpected} ± ${allowedErrors}`
	);
}

/** Measures round-trip time only; nothing is asserted. */
export async function timedPing6(
	context: HarnessRunContext,
	sender: MeshDevice,
	targetAddress: string,
	numPings: number,
	options: Pick<PingOptions, 'pingSize' | 'interface'> = {}
): Promise<number> {
	sender.timedPing6(targetAddress, numPings, options.pingSize ?? DEFAULT_PING_SIZE, options.interface);
	await waitForDevices(withSender(context.devices.devices, sender));

	context.recordPing({ roundTripTimeMs: sender.ping6RoundTripTime });
	context.logger.info(`Ping RTT: ${sender.ping6RoundTripTime}`);
	return sender.ping6RoundTripTime;
}

/** One sender pings every target in turn; each failing target counts once. */
export async function ping6MultiDest(
	context: HarnessRunContext,
	sender: MeshDevice,
	targetAddresses: readonly string[],
	numPings: number,
	options: PingOptions = {}
): Promise<void> {
	const allowedErrors = options.allowedErrors ?? 0;
	const numExpected = options.numExpected ?? numPings;
	let failedDeviceCount = 0;

	for (const address of targetAddresses) {
		sender.ping6(address, numPings, options.pingSize ?? DEFAULT_PING_SIZE, options.interface);
		const error = await sender.waitForCompletion();

		if (error === undefined) {
			context.logger.info(`Pings sent: ${sender.ping6Sent}`);
			context.logger.info(`Pings received: ${sender.ping6Received}`);
		} else {
			context.logger.error(`Ping to ${address} failed: ${error}`);
		}

		if (error !== undefined || !withinTolerance(sender.ping6Received, numExpected, allowedErrors)) {
			failedDeviceCount += 1;
		}
	}

	assert.equal(failedDeviceCount, 0, `${failedDeviceCount} of ${targetAddresses.length} destinations failed`);
}

/**
 * Several senders ping one target. All pings are dispatched first, each
 * followed by the settle delay and a completion barrier over the registered
 * devices; results are collected afterwards.
 */
export async function ping6MultiSource(
	context: HarnessRunContext,
	senders: readonly MeshDevice[],
	targetAddress: string,
	numPings: number,
	options: MultiSourcePingOptions = {}
): Promise<void> {
	const allowedErrors = options.allowedErrors ?? 0;
	const numExpected = options.numExpected ?? numPings;
	const settleMs = options.settleMs ?? context.config.multiSourceSettleMs;
	const senderErrors = new Map<MeshDevice, string>();

	for (const sender of senders) {
		sender.ping6(targetAddress, numPings, options.pingSize ?? DEFAULT_PING_SIZE, options.interface);
		await context.sleep(settleMs);

		for (const device of context.devices.devices) {
			const error = await device.waitForCompletion();
			if (error === undefined) {
				continue;
			}
			if (!senders.includes(device)) {
				assert.fail(error);
			}
			if (!senderErrors.has(device)) {
				senderErrors.set(device, error);
			}
		}
	}

	let failedDeviceCount = 0;
	for (const sender of senders) {
		const error = senderErrors.get(sender) ?? (await sender.waitForCompletion());

		if (error !== undefined) {
			context.logger.error(`${sender.name} ping failed: ${error}`);
			failedDeviceCount += 1;
			continue;
		}
		if (!withinTolerance(sender.ping6Received, numExpected, allowedErrors)) {
			failedDeviceCount += 1;
		}
	}

	assert.equal(failedDeviceCount, 0, `${failedDeviceCount} of ${senders.length} senders failed`);
}
