import * as fs from 'node:fs';
import * as path from 'node:path';
import { NoopLogger, type Logger } from '../diagnostics/logger';
import { TaskQueue } from '../device/taskQueue';
import { HardwareError } from '../errors/HardwareError';
import { encodePcapGlobalHeader, encodePcapRecord, parseSnifferLine } from './pcapWriter';
import type { SnifferFactory, SnifferHandle, SnifferStats } from './snifferHandle';
import { listSnifferCandidates, type SerialPortLister } from './snifferDiscovery';

export interface SerialPortLike {
	write(data: Buffer, callback: (error?: Error | null) => void): void;
	close(callback: (error?: Error | null) => void): void;
	removeAllListeners(event?: string): this;
	on(event: 'data', listener: (chunk: Buffer) => void): this;
	on(event: 'error', listener: (error: Error) => void): this;
}

type SerialPortCtor = new (options: { path: string; baudRate: number; autoOpen: boolean }) => SerialPortLike & {
	open(callback: (error?: Error | null) => void): void;
};

export type SerialPortOpener = (portPath: string, baudRate: number) => Promise<SerialPortLike>;

export interface SerialSnifferOptions {
	portPath: string;
	baudRate?: number;
	openPort?: SerialPortOpener;
	now?: () => number;
	/** Called once the sniffer has been torn down and its port is free again. */
	onRelease?: (portPath: string) => void;
}

const DEFAULT_BAUD_RATE = 115_200;

function loadSerialPortCtor(): SerialPortCtor {
	try {
		// eslint-disable-next-line @typescript-eslint/no-var-requires
		const mod = require('serialport') as { SerialPort?: SerialPortCtor } | SerialPortCtor;

		if (typeof mod === 'function') {
			return mod;
		}

		if (mod && typeof mod === 'object' && typeof mod.SerialPort === 'function') {
			return mod.SerialPort;
		}
	} catch (error) {
		const detail = error instanceof Error ? error.message : String(error);
		throw new HardwareError({
			code: 'SNIFFER_UNAVAILABLE',
			message: `Serial sniffer requires package "serialport". (${detail})`,
			cause: error
		});
	}

	throw new HardwareError({ code: 'SNIFFER_UNAVAILABLE', message: 'Serial sniffer could not load serialport module.' });
}

export const openSerialPort: SerialPortOpener = async (portPath, baudRate) => {
	const SerialPort = loadSerialPortCtor();
	const port = new SerialPort({ path: portPath, baudRate, autoOpen: false });
	await new Promise<void>((resolve, reject) => {
		port.open((error?: Error | null) => {
			if (error) {
				reject(error);
				return;
			}
			resolve();
		});
	});
	return port;
};

interface CaptureTarget {
	channel: number;
	outputPath: string;
}

/**
 * Drives a USB serial 802.15.4 sniffer dongle: tunes it with
 * `channel <n>`/`receive`, parses the `received:` lines it streams back and
 * appends each frame to `sniffer_ch<n>.pcap` in the output directory.
 */
export class SerialSniffer implements SnifferHandle {
	public readonly kind = 'serial-802.15.4';
	public readonly portPath: string;

	private readonly baudRate: number;
	private readonly openPort: SerialPortOpener;
	private readonly now: () => number;
	private readonly onRelease?: (portPath: string) => void;
	private readonly queue = new TaskQueue();

	private logger: Logger = new NoopLogger();
	private port?: SerialPortLike;
	private captureFd?: number;
	private target?: CaptureTarget;
	private lineBuffer = '';
	private framesCaptured = 0;
	private bytesCaptured = 0;

	public constructor(options: SerialSnifferOptions) {
		this.portPath = options.portPath;
		this.baudRate = options.baudRate ?? DEFAULT_BAUD_RATE;
		this.openPort = options.openPort ?? openSerialPort;
		this.now = options.now ?? Date.now;
		this.onRelease = options.onRelease;
	}

	public get stats(): SnifferStats {
		return {
			channel: this.target?.channel,
			capturing: this.captureFd !== undefined,
			framesCaptured: this.framesCaptured,
			bytesCaptured: this.bytesCaptured
		};
	}

	public get capturePath(): string | undefined {
		return this.target ? path.join(this.target.outputPath, `sniffer_ch${this.target.channel}.pcap`) : undefined;
	}

	public setLogger(logger: Logger): void {
		this.logger = logger.child(`sniffer.${path.basename(this.portPath)}`);
	}

	public start(channel: number, outputPath: string): void {
		this.queue.enqueue('sniffer start', async () => {
			this.target = { channel, outputPath };
			await this.beginCapture(false);
		});
	}

	public stop(): void {
		this.queue.enqueue('sniffer stop', () => this.endCapture());
	}

	public restart(): void {
		this.queue.enqueue('sniffer restart', async () => {
			if (!this.target) {
				throw new Error('Sniffer was never started.');
			}
			await this.endCapture();
			await this.beginCapture(true);
		});
	}

	public getStats(): void {
		this.queue.enqueue('sniffer stats', () => {
			this.logger.info('Sniffer stats', { ...this.stats });
		});
	}

	public tearDown(): void {
		this.queue.enqueue('sniffer tear down', async () => {
			try {
				await this.endCapture();
				const port = this.port;
				this.port = undefined;
				if (port) {
					port.removeAllListeners();
					await new Promise<void>((resolve) => port.close(() => resolve()));
				}
			} finally {
				this.onRelease?.(this.portPath);
			}
		});
	}

	public waitForCompletion(): Promise<string | undefined> {
		return this.queue.waitForCompletion();
	}

	private async ensurePort(): Promise<SerialPortLike> {
		if (this.port) {
			return this.port;
		}
		let port: SerialPortLike;
		try {
			port = await this.openPort(this.portPath, this.baudRate);
		} catch (error) {
			throw new HardwareError({
				code: 'SNIFFER_IO',
				message: `Opening sniffer port ${this.portPath} failed: ${error instanceof Error ? error.message : String(error)}`,
				deviceId: this.portPath,
				cause: error
			});
		}
		port.on('data', (chunk) => this.handleData(chunk));
		port.on('error', (error) => this.logger.error(`Sniffer port error: ${error.message}`));
		this.port = port;
		return port;
	}

	private async beginCapture(append: boolean): Promise<void> {
		const target = this.target;
		const capturePath = this.capturePath;
		if (!target || !capturePath) {
			return;
		}
		const port = await this.ensurePort();
		await this.sendCommand(port, 'sleep');
		await this.sendCommand(port, `channel ${target.channel}`);

		const hasHeader = append && fs.existsSync(capturePath) && fs.statSync(capturePath).size > 0;
		this.captureFd = fs.openSync(capturePath, append ? 'a' : 'w');
		if (!hasHeader) {
			fs.writeSync(this.captureFd, encodePcapGlobalHeader());
		}
		this.lineBuffer = '';
		await this.sendCommand(port, 'receive');
		this.logger.debug(`Capturing channel ${target.channel} into ${capturePath}`);
	}

	private async endCapture(): Promise<void> {
		if (this.port) {
			await this.sendCommand(this.port, 'sleep');
		}
		if (this.captureFd !== undefined) {
			fs.closeSync(this.captureFd);
			this.captureFd = undefined;
		}
	}

	private sendCommand(port: SerialPortLike, command: string): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			port.write(Buffer.from(`${command}\r\n`, 'ascii'), (error?: Error | null) => {
				if (error) {
					reject(error);
					return;
				}
				resolve();
			});
		});
	}

	private handleData(chunk: Buffer): void {
		this.lineBuffer += chunk.toString('ascii');
		const lines = this.lineBuffer.split(/\r?\n/);
		this.lineBuffer = lines.pop() ?? '';
		for (const line of lines) {
			const frame = parseSnifferLine(line);
			if (!frame || this.captureFd === undefined) {
				continue;
			}
			fs.writeSync(this.captureFd, encodePcapRecord(frame.payload, this.now()));
			this.framesCaptured += 1;
			this.bytesCaptured += frame.payload.length;
		}
	}
}

export interface SerialSnifferFactoryOptions {
	/** Fixed port; when absent a free dongle is discovered per channel. */
	portPath?: string;
	baudRate?: number;
	listPorts?: SerialPortLister;
	openPort?: SerialPortOpener;
}

export function createSerialSnifferFactory(options: SerialSnifferFactoryOptions = {}): SnifferFactory {
	const claimedPaths = new Set<string>();
	return {
		name: 'serial-802.15.4',
		async create(): Promise<SnifferHandle> {
			let portPath = options.portPath;
			if (portPath && claimedPaths.has(portPath)) {
				throw new HardwareError({
					code: 'SNIFFER_UNAVAILABLE',
					message: `Sniffer port ${portPath} is already capturing another channel.`,
					deviceId: portPath
				});
			}
			if (!portPath) {
				const [candidate] = await listSnifferCandidates(claimedPaths, options.listPorts);
				if (!candidate) {
					throw new HardwareError({ code: 'SNIFFER_UNAVAILABLE', message: 'No 802.15.4 sniffer dongle found.' });
				}
				portPath = candidate.path;
			}
			claimedPaths.add(portPath);
			return new SerialSniffer({
				portPath,
				baudRate: options.baudRate,
				openPort: options.openPort,
				onRelease: (releasedPath) => claimedPaths.delete(releasedPath)
			});
		}
	};
}
