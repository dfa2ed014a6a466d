import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { mergeHarnessConfig, readHarnessConfig, type HarnessConfigSnapshot } from '../config/harnessConfig';
import { DeviceRegistry } from '../device/deviceRegistry';
import { HierarchicalLogger } from '../diagnostics/logger';
import { ResultLedger, type PingMetrics } from '../results/resultLedger';
import { createSerialSnifferFactory } from '../sniffer/serialSniffer';
import type { SnifferFactory } from '../sniffer/snifferHandle';
import { SnifferRegistry } from '../sniffer/snifferRegistry';
import { VisualizationBridge, type VisualizationSessionFactory } from '../visualization/visualizationSession';

export interface HarnessRunContextOptions {
	/** Values layered over the environment-derived configuration. */
	config?: Partial<HarnessConfigSnapshot>;
	env?: NodeJS.ProcessEnv;
	/** Sniffer implementations in priority order. */
	snifferFactories?: readonly SnifferFactory[];
	visualizationFactory?: VisualizationSessionFactory;
	consoleWrite?: (line: string) => void;
	now?: () => Date;
	sleep?: (ms: number) => Promise<void>;
}

export interface CurrentTest {
	className: string;
	methodName: string;
}

function pad2(value: number): string {
	return String(value).padStart(2, '0');
}

/** Local time as `YYYY-MM-DD_HH.MM.SS`. */
export function formatRunTimestamp(date: Date): string {
	return (
		`${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}` +
		`_${pad2(date.getHours())}.${pad2(date.getMinutes())}.${pad2(date.getSeconds())}`
	);
}

function defaultSleep(ms: number): Promise<void> {
	if (ms <= 0) {
		return Promise.resolve();
	}
	return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Everything one harness run shares between its test classes: the framework
 * logger, the result ledger and the device, sniffer and visualization
 * registries. Fixtures receive it through their constructor.
 */
export class HarnessRunContext {
	public readonly config: HarnessConfigSnapshot;
	public readonly logger = new HierarchicalLogger();
	public readonly ledger = new ResultLedger();
	public readonly visualization = new VisualizationBridge();
	public readonly devices: DeviceRegistry;
	public readonly sniffers: SnifferRegistry;
	public readonly visualizationFactory?: VisualizationSessionFactory;
	public readonly consoleWrite: (line: string) => void;
	public readonly now: () => Date;
	public readonly sleep: (ms: number) => Promise<void>;

	public currentClass?: string;
	public currentMethod?: string;
	public outputDirectory?: string;

	public constructor(options: HarnessRunContextOptions = {}) {
		this.config = mergeHarnessConfig(readHarnessConfig(options.env), options.config);
		this.visualizationFactory = options.visualizationFactory;
		this.consoleWrite = options.consoleWrite ?? ((line) => console.log(line));
		this.now = options.now ?? (() => new Date());
		this.sleep = options.sleep ?? defaultSleep;
		this.devices = new DeviceRegistry(this.visualization, () => this.logger);
		this.sniffers = new SnifferRegistry(
			options.snifferFactories ?? [createSerialSnifferFactory({ portPath: this.config.snifferPort })],
			() => this.logger
		);
	}

	public requireClassName(): string {
		if (!this.currentClass) {
			throw new Error('No test class is set up in this run.');
		}
		return this.currentClass;
	}

	public requireOutputDirectory(): string {
		if (!this.outputDirectory) {
			throw new Error('No output directory was created for the current test class.');
		}
		return this.outputDirectory;
	}

	public currentTest(): CurrentTest | undefined {
		if (!this.currentClass || !this.currentMethod) {
			return undefined;
		}
		return { className: this.currentClass, methodName: this.currentMethod };
	}

	/** Creates `<outputDirectory>/<timestamp>_<className>`. */
	public async createClassOutputDirectory(className: string): Promise<string> {
		const directory = path.join(this.config.outputDirectory, `${formatRunTimestamp(this.now())}_${className}`);
		await fs.mkdir(directory, { recursive: true });
		this.outputDirectory = directory;
		return directory;
	}

	/** Attaches ping metrics to the running test, if any. */
	public recordPing(metrics: PingMetrics): void {
		const current = this.currentTest();
		if (current && this.ledger.getRecord(current.className, current.methodName)) {
			this.ledger.recordPing(current.className, current.methodName, metrics);
		}
	}
}
