import * as fs from 'node:fs/promises';
import * as path from 'node:path';

export type TrackingId = string | number;

export const SUITE_ID = 'suite_id';
export const RESULTS_FILE_NAME = 'results.json';

export type TestClassification = 'PASS' | 'FAILED SETUP' | 'FAILED TEARDOWN' | 'FAILED TEST';

export interface PingMetrics {
	sent?: number;
	received?: number;
	roundTripTimeMs?: number;
}

export interface ResultRecord {
	setUp: boolean;
	test: boolean;
	tearDown: boolean;
	trackingId: TrackingId | null;
	ping?: PingMetrics;
}

export type ResultPhase = 'setUp' | 'test' | 'tearDown';

export interface ClassLedgerEntry {
	suiteId: TrackingId | null;
	setupClass?: boolean;
	readonly tests: Map<string, ResultRecord>;
}

/** Wire form of a record inside results.json. */
export interface SerializedResultRecord {
	setUp: boolean;
	test: boolean;
	tearDown: boolean;
	case_id: TrackingId | null;
	pings_sent?: number;
	pings_received?: number;
	ping_rtt?: number;
}

export type SerializedClassEntry = Record<string, SerializedResultRecord | TrackingId | boolean | null>;

export function classifyResult(record: Pick<ResultRecord, ResultPhase>): TestClassification {
	if (record.setUp && record.test && record.tearDown) {
		return 'PASS';
	}
	if (!record.setUp) {
		return 'FAILED SETUP';
	}
	if (!record.tearDown) {
		return 'FAILED TEARDOWN';
	}
	return 'FAILED TEST';
}

function serializeRecord(record: ResultRecord): SerializedResultRecord {
	const serialized: SerializedResultRecord = {
		setUp: record.setUp,
		test: record.test,
		tearDown: record.tearDown,
		case_id: record.trackingId
	};
	if (record.ping?.sent !== undefined) {
		serialized.pings_sent = record.ping.sent;
	}
	if (record.ping?.received !== undefined) {
		serialized.pings_received = record.ping.received;
	}
	if (record.ping?.roundTripTimeMs !== undefined) {
		serialized.ping_rtt = record.ping.roundTripTimeMs;
	}
	return serialized;
}

/**
 * Per-run record of which lifecycle phases of which tests succeeded, keyed by
 * test class then test method, both in insertion order.
 */
export class ResultLedger {
	private readonly classes = new Map<string, ClassLedgerEntry>();

	/**
	 * Creates the class slot. A class that runs again gets a fresh slot in its
	 * original position; the earlier attempt's records are dropped.
	 */
	public openClass(className: string, suiteId: TrackingId | null): ClassLedgerEntry {
		const entry: ClassLedgerEntry = { suiteId, tests: new Map() };
		this.classes.set(className, entry);
		return entry;
	}

	public markSetupClassFailed(className: string): void {
		this.requireClass(className).setupClass = false;
	}

	public beginTest(className: string, methodName: string, trackingId: TrackingId | null): ResultRecord {
		const record: ResultRecord = { setUp: false, test: false, tearDown: false, trackingId };
		this.requireClass(className).tests.set(methodName, record);
		return record;
	}

	public markPhase(className: string, methodName: string, phase: ResultPhase): void {
		this.requireRecord(className, methodName)[phase] = true;
	}

	public recordPing(className: string, methodName: string, metrics: PingMetrics): void {
		const record = this.requireRecord(className, methodName);
		record.ping = { ...record.ping, ...metrics };
	}

	public getClass(className: string): ClassLedgerEntry | undefined {
		return this.classes.get(className);
	}

	public getRecord(className: string, methodName: string): ResultRecord | undefined {
		return this.classes.get(className)?.tests.get(methodName);
	}

	public classNames(): string[] {
		return [...this.classes.keys()];
	}

	public toJSON(): Record<string, SerializedClassEntry> {
		const output: Record<string, SerializedClassEntry> = {};
		for (const [className, entry] of this.classes) {
			const serialized: SerializedClassEntry = { [SUITE_ID]: entry.suiteId };
			if (entry.setupClass !== undefined) {
				serialized.setupClass = entry.setupClass;
			}
			for (const [methodName, record] of entry.tests) {
				serialized[methodName] = serializeRecord(record);
			}
			output[className] = serialized;
		}
		return output;
	}

	/** Writes results.json into `directory` and returns its path. */
	public async writeTo(directory: string): Promise<string> {
		const target = path.join(directory, RESULTS_FILE_NAME);
		await fs.mkdir(directory, { recursive: true });
		await fs.writeFile(target, `${JSON.stringify(this.toJSON(), null, '\t')}\n`, 'utf8');
		return target;
	}

	private requireClass(className: string): ClassLedgerEntry {
		const entry = this.classes.get(className);
		if (!entry) {
			throw new Error(`Result ledger has no entry for test class "${className}".`);
		}
		return entry;
	}

	private requireRecord(className: string, methodName: string): ResultRecord {
		const record = this.requireClass(className).tests.get(methodName);
		if (!record) {
			throw new Error(`Result ledger has no record for ${className}.${methodName}.`);
		}
		return record;
	}
}
