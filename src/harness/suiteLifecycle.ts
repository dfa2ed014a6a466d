import assert from 'node:assert/strict';
import * as path from 'node:path';
import { configureFrameworkLogger, logErrorStack } from '../diagnostics/logger';
import { errorMessage, isHardwareUnavailableError } from '../errors/HardwareError';
import { SUITE_ID, type TrackingId } from '../results/resultLedger';
import { formatSetupClassFailureBanner, formatSummaryLines } from '../results/summaryTable';
import { discoverTestMethods, type MeshTestCase, type MeshTestCaseClass, type StressTestOptions } from './meshTestCase';
import { waitForDevices } from './pingAssertions';
import type { HarnessRunContext } from './runContext';

export const FRAMEWORK_LOG_FILE = 'harness.log';

/**
 * Phases of one test class run against a fixture instance. Each phase brackets
 * the user hook with logging and ledger bookkeeping and lets the hook's error
 * propagate unchanged.
 */
export class MeshSuiteLifecycle<T extends MeshTestCase> {
	public readonly fixture: T;

	public constructor(
		public readonly testClass: MeshTestCaseClass<T>,
		public readonly context: HarnessRunContext
	) {
		this.fixture = new testClass(context);
	}

	public get className(): string {
		return this.testClass.name;
	}

	public testMethodNames(): string[] {
		return discoverTestMethods(this.testClass);
	}

	public async setUpClass(): Promise<void> {
		const { context, className } = this;
		context.sniffers.reset();
		context.currentClass = className;
		context.currentMethod = undefined;

		const outputDirectory = await context.createClassOutputDirectory(className);
		const logger = configureFrameworkLogger(
			context.logger,
			path.join(outputDirectory, FRAMEWORK_LOG_FILE),
			context.config.consoleVerbosity,
			context.consoleWrite
		);
		logger.info(`Log dest: ${outputDirectory}`);
		logger.info(`SET UP CLASS ${className}`);

		context.ledger.openClass(className, this.lookupTrackingId(SUITE_ID));
		this.openVisualization();

		try {
			await this.fixture.setUpClass();
			await context.sniffers.startAll(outputDirectory);
			if (context.visualization.enabled) {
				for (const device of context.devices.devices) {
					context.visualization.reportExtAddress(device);
				}
			}
		} catch (error) {
			context.ledger.markSetupClassFailed(className);
			if (isHardwareUnavailableError(error)) {
				await this.releaseAfterSetupFailure();
				logger.error('Hardware Not Found Error !!!');
				await context.ledger.writeTo(outputDirectory);
			} else {
				logErrorStack(logger, error);
				logger.error('Hardware Configuration Error !!!');
				await context.ledger.writeTo(outputDirectory);
				for (const line of formatSetupClassFailureBanner(className)) {
					logger.info(line);
				}
				await this.releaseAfterSetupFailure();
			}
			await this.closeAfterSetupFailure();
			throw error;
		}
	}

	public async setUp(methodName: string): Promise<void> {
		const { context, className } = this;
		context.currentMethod = methodName;
		context.ledger.beginTest(className, methodName, this.lookupTrackingId(methodName));
		context.logger.info(`SET UP ${className}.${methodName}`);

		await this.fixture.setUp();

		context.ledger.markPhase(className, methodName, 'setUp');
	}

	public async runTest(methodName: string): Promise<void> {
		const { context, className } = this;
		const body = this.resolveTestBody(methodName);

		await waitForDevices(context.devices.devices);
		context.logger.info(`RUNNING TEST ${className}.${methodName}`);
		context.visualization.setTestTitle(`${className}.${methodName}`);

		const stress = this.testClass.stressTests?.[methodName];
		if (stress) {
			await this.runStressTest(methodName, body, stress);
			return;
		}

		try {
			await body();
		} catch (error) {
			logErrorStack(context.logger, error);
			throw error;
		}

		context.ledger.markPhase(className, methodName, 'test');
	}

	/** A tearDown that returns counts as successful; a throw leaves it failed. */
	public async tearDown(methodName: string): Promise<void> {
		const { context, className } = this;
		context.logger.info(`TEAR DOWN ${className}.${methodName}`);

		await waitForDevices(context.devices.devices);
		await this.fixture.tearDown();

		context.ledger.markPhase(className, methodName, 'tearDown');
	}

	/**
	 * Runs the user hook between sniffer shutdown and the summary. The ledger
	 * is written and devices are released even when the hook throws; the
	 * hook's error is rethrown afterwards.
	 */
	public async tearDownClass(): Promise<void> {
		const { context, className } = this;
		const logger = context.logger;
		logger.info(`TEAR DOWN CLASS ${className}`);
		context.visualization.setTestTitle(`${className}.tear_down`);

		await context.sniffers.tearDownAll();

		let hookFailed = false;
		let hookError: unknown;
		try {
			await this.fixture.tearDownClass();
		} catch (error) {
			hookFailed = true;
			hookError = error;
			logErrorStack(logger, error);
		}

		logger.info(`TEAR DOWN CLASS DONE ${className}`);
		for (const line of formatSummaryLines(context.ledger)) {
			logger.info(line);
		}
		logger.detachAllSinks();

		await context.ledger.writeTo(context.requireOutputDirectory());

		context.devices.clear();
		let releaseFailed = false;
		let releaseError: unknown;
		try {
			await context.devices.releaseAll();
		} catch (error) {
			releaseFailed = true;
			releaseError = error;
		}
		context.visualization.close();
		context.currentMethod = undefined;

		if (hookFailed) {
			throw hookError;
		}
		if (releaseFailed) {
			throw releaseError;
		}
	}

	private async runStressTest(
		methodName: string,
		body: () => Promise<unknown>,
		options: StressTestOptions
	): Promise<void> {
		const { context, className } = this;
		const iterations = Math.max(0, Math.floor(options.iterations));
		const allowedFailures = Math.max(0, Math.floor(options.allowedFailures ?? 0));
		let passCount = 0;

		for (let iteration = 1; iteration <= iterations; iteration += 1) {
			context.logger.info(`RUNNING TEST ${className}.${methodName} (${iteration}/${iterations})`);
			try {
				await body();
				passCount += 1;
			} catch (error) {
				logErrorStack(context.logger, error);
			}
		}

		const passRate = `Pass Rate: ${passCount}/${iterations}`;
		if (passCount < iterations - allowedFailures) {
			context.logger.error(passRate);
			assert.fail(passRate);
		}
		context.logger.info(passRate);
		context.ledger.markPhase(className, methodName, 'test');
	}

	private resolveTestBody(methodName: string): () => Promise<unknown> {
		const candidate: unknown = Reflect.get(this.fixture, methodName);
		if (typeof candidate !== 'function') {
			throw new Error(`${this.className} has no test method "${methodName}".`);
		}
		return async () => candidate.call(this.fixture);
	}

	private lookupTrackingId(key: string): TrackingId | null {
		return this.testClass.trackingIds?.[key] ?? null;
	}

	private openVisualization(): void {
		const { context, className } = this;
		const host = context.config.visualizationHost;
		if (!host) {
			return;
		}
		if (!context.visualizationFactory) {
			context.logger.warn(`Visualization host ${host} is configured but no session factory was provided.`);
			return;
		}
		context.visualization.attach(context.visualizationFactory(host, context.logger.child('visualization')));
		context.visualization.setTestTitle(`${className}.set_up`);
		context.visualization.setReplaySpeed(1.0);
	}

	/** Frees sniffer ports, the visualization session and the class log file. */
	private async closeAfterSetupFailure(): Promise<void> {
		const { context } = this;
		await context.sniffers.tearDownAll();
		context.visualization.close();
		context.logger.detachAllSinks();
	}

	private async releaseAfterSetupFailure(): Promise<void> {
		try {
			await this.context.devices.releaseAll();
		} catch (error) {
			this.context.logger.error(`Device release after setup failure: ${errorMessage(error)}`);
		}
	}
}
