import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import test from 'node:test';
import { EXT_ADDRESS_PROPERTY } from '../device/meshDevice';
import { HardwareError } from '../errors/HardwareError';
import { MeshTestCase, discoverTestMethods } from '../harness/meshTestCase';
import { FRAMEWORK_LOG_FILE } from '../harness/suiteLifecycle';
import { runMeshSuite, suitePassed } from '../harness/suiteRunner';
import { FakeMeshDevice, FakeVisualizableDevice } from '../mock/fakeMeshDevice';
import { createFakeSnifferFactory } from '../mock/fakeSniffer';
import { createFakeVisualizationFactory, type FakeVisualizationSession } from '../mock/fakeVisualizationSession';
import { createSerialSnifferFactory } from '../sniffer/serialSniffer';
import {
	FIXED_RUN_STAMP,
	FakeSerialPort,
	createTempDir,
	createTestContext,
	hasLogLine,
	readJson
} from './testHelpers';

function classDirectory(root: string, className: string): string {
	return path.join(root, `${FIXED_RUN_STAMP}_${className}`);
}

function errorText(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

test('passing suite records every phase and releases its devices', async () => {
	const dir = createTempDir();
	const sniffers = createFakeSnifferFactory();
	const { context, consoleLines } = createTestContext(dir, { snifferFactories: [sniffers] });
	const leader = new FakeMeshDevice({ name: 'leader' });

	class TwoPassing extends MeshTestCase {
		public static trackingIds = { suite_id: 'S7', testAlpha: 'C1' };

		public async setUpClass(): Promise<void> {
			this.addTestDevice(leader);
			await this.snifferInit(11);
		}

		public async testAlpha(): Promise<void> {
			await this.ping6(leader, 'fd00::1', 10);
		}

		public testBeta(): void {}
	}

	const outcome = await runMeshSuite(TwoPassing, { context });
	const outputDirectory = classDirectory(dir, 'TwoPassing');

	assert.equal(suitePassed(outcome), true);
	assert.equal(outcome.outputDirectory, outputDirectory);
	assert.deepEqual(outcome.tests, [
		{ name: 'testAlpha', status: 'passed' },
		{ name: 'testBeta', status: 'passed' }
	]);

	const results = readJson(path.join(outputDirectory, 'results.json'));
	assert.deepEqual(results, {
		TwoPassing: {
			suite_id: 'S7',
			testAlpha: { setUp: true, test: true, tearDown: true, case_id: 'C1', pings_sent: 10, pings_received: 10 },
			testBeta: { setUp: true, test: true, tearDown: true, case_id: null }
		}
	});

	assert.equal(leader.tearDownCount, 1);
	assert.deepEqual(context.devices.devices, []);
	assert.deepEqual(sniffers.created[0].calls, [
		'setLogger',
		'wait',
		`start 11 ${outputDirectory}`,
		'wait',
		'stop',
		'wait',
		'tearDown',
		'wait'
	]);

	const log = fs.readFileSync(path.join(outputDirectory, FRAMEWORK_LOG_FILE), 'utf8').split('\n');
	assert.ok(hasLogLine(log, 'info', 'SET UP CLASS TwoPassing'));
	assert.ok(hasLogLine(log, 'info', 'RUNNING TEST TwoPassing.testAlpha'));
	assert.ok(hasLogLine(log, 'info', 'TEAR DOWN CLASS DONE TwoPassing'));
	assert.ok(hasLogLine(consoleLines, 'info', `    testAlpha${'.'.repeat(51)}PASS`));
	assert.ok(hasLogLine(consoleLines, 'info', `    testBeta${'.'.repeat(52)}PASS`));
	assert.equal(context.logger.sinkCount, 0);
});

test('a failing test still runs tearDown and is classified FAILED TEST', async () => {
	const dir = createTempDir();
	const { context, consoleLines } = createTestContext(dir);
	const tearDowns: string[] = [];

	class FlakyRoute extends MeshTestCase {
		public tearDown(): void {
			tearDowns.push(this.context.currentMethod ?? '');
		}

		public testBroken(): void {
			throw new Error('route lost');
		}

		public testFine(): void {}
	}

	const outcome = await runMeshSuite(FlakyRoute, { context });

	assert.equal(suitePassed(outcome), false);
	assert.equal(outcome.tests[0].status, 'failed');
	assert.equal(outcome.tests[0].failedPhase, 'test');
	assert.equal(errorText(outcome.tests[0].error), 'route lost');
	assert.equal(outcome.tests[1].status, 'passed');
	assert.deepEqual(tearDowns, ['testBroken', 'testFine']);
	assert.deepEqual(context.ledger.getRecord('FlakyRoute', 'testBroken'), {
		setUp: true,
		test: false,
		tearDown: true,
		trackingId: null
	});
	assert.ok(hasLogLine(consoleLines, 'error', 'Error: route lost'));
	assert.ok(hasLogLine(consoleLines, 'info', `    testBroken${'.'.repeat(43)}FAILED TEST`));
});

test('a failing setUp skips the test body and its tearDown', async () => {
	const { context } = createTestContext(createTempDir());
	const calls: string[] = [];

	class NoRoute extends MeshTestCase {
		public setUp(): void {
			if (this.context.currentMethod === 'testSkipped') {
				throw new Error('no route');
			}
		}

		public tearDown(): void {
			calls.push(`tearDown ${this.context.currentMethod ?? ''}`);
		}

		public testSkipped(): void {
			calls.push('testSkipped');
		}

		public testRuns(): void {
			calls.push('testRuns');
		}
	}

	const outcome = await runMeshSuite(NoRoute, { context });

	assert.deepEqual(calls, ['testRuns', 'tearDown testRuns']);
	assert.equal(outcome.tests[0].failedPhase, 'setUp');
	assert.deepEqual(context.ledger.toJSON().NoRoute.testSkipped, {
		setUp: false,
		test: false,
		tearDown: false,
		case_id: null
	});
});

test('a failing tearDown is classified FAILED TEARDOWN', async () => {
	const { context, consoleLines } = createTestContext(createTempDir());

	class LeakyTearDown extends MeshTestCase {
		public tearDown(): void {
			throw new Error('still attached');
		}

		public testOnly(): void {}
	}

	const outcome = await runMeshSuite(LeakyTearDown, { context });

	assert.deepEqual(
		outcome.tests.map((result) => [result.status, result.failedPhase, errorText(result.error)]),
		[['failed', 'tearDown', 'still attached']]
	);
	assert.ok(hasLogLine(consoleLines, 'info', `    testOnly${'.'.repeat(41)}FAILED TEARDOWN`));
});

test('missing hardware in setUpClass writes results before failing', async () => {
	const dir = createTempDir();
	const { context, consoleLines } = createTestContext(dir);
	const leader = new FakeMeshDevice({ name: 'leader' });
	let classTornDown = false;

	class NoHardware extends MeshTestCase {
		public setUpClass(): void {
			this.claimDevice(leader);
			throw new HardwareError({ code: 'HARDWARE_NOT_FOUND', message: 'No leader board found' });
		}

		public tearDownClass(): void {
			classTornDown = true;
		}

		public testNever(): void {}
	}

	const outcome = await runMeshSuite(NoHardware, { context });

	assert.ok(outcome.setUpClassError instanceof HardwareError);
	assert.deepEqual(outcome.tests, []);
	assert.equal(classTornDown, false);
	assert.equal(leader.tearDownCount, 1);
	assert.deepEqual(readJson(path.join(classDirectory(dir, 'NoHardware'), 'results.json')), {
		NoHardware: { suite_id: null, setupClass: false }
	});
	assert.ok(hasLogLine(consoleLines, 'error', 'Hardware Not Found Error !!!'));
	assert.equal(
		consoleLines.some((line) => line.includes('CHECK HARDWARE CONFIGURATION')),
		false
	);
});

test('a configuration error in setUpClass prints the hardware banner', async () => {
	const dir = createTempDir();
	const { context, consoleLines } = createTestContext(dir);
	const leader = new FakeMeshDevice({ name: 'leader' });

	class BadConfig extends MeshTestCase {
		public setUpClass(): void {
			this.addTestDevice(leader);
			throw new Error('leader joined the wrong PAN');
		}

		public testNever(): void {}
	}

	const outcome = await runMeshSuite(BadConfig, { context });

	assert.equal(errorText(outcome.setUpClassError), 'leader joined the wrong PAN');
	assert.equal(leader.tearDownCount, 1);
	assert.deepEqual(context.devices.devices, []);
	assert.ok(hasLogLine(consoleLines, 'error', 'Error: leader joined the wrong PAN'));
	assert.ok(hasLogLine(consoleLines, 'error', 'Hardware Configuration Error !!!'));
	assert.ok(hasLogLine(consoleLines, 'info', `BadConfig${'.'.repeat(42)}FAILED SETUPCLASS`));
	assert.deepEqual(readJson(path.join(classDirectory(dir, 'BadConfig'), 'results.json')), {
		BadConfig: { suite_id: null, setupClass: false }
	});
});

test('a failing tearDownClass still writes results and releases devices', async () => {
	const dir = createTempDir();
	const { context } = createTestContext(dir);
	const leader = new FakeMeshDevice({ name: 'leader' });

	class TearDownFails extends MeshTestCase {
		public setUpClass(): void {
			this.addTestDevice(leader);
		}

		public tearDownClass(): void {
			throw new Error('cleanup failed');
		}

		public testOne(): void {}
	}

	const outcome = await runMeshSuite(TearDownFails, { context });

	assert.equal(errorText(outcome.tearDownClassError), 'cleanup failed');
	assert.equal(suitePassed(outcome), false);
	assert.equal(leader.tearDownCount, 1);
	assert.deepEqual(readJson(path.join(classDirectory(dir, 'TearDownFails'), 'results.json')), {
		TearDownFails: { suite_id: null, testOne: { setUp: true, test: true, tearDown: true, case_id: null } }
	});
});

test('a class re-run after a setup failure reports only the new attempt', async () => {
	const dir = createTempDir();
	const { context, consoleLines } = createTestContext(dir, {
		snifferFactories: [
			createSerialSnifferFactory({ portPath: '/dev/ttyACM0', openPort: async () => new FakeSerialPort() })
		]
	});
	const kinds: Array<string | undefined> = [];
	let attempts = 0;

	class Flaky extends MeshTestCase {
		public async setUpClass(): Promise<void> {
			attempts += 1;
			await this.snifferInit(11);
			if (attempts === 1) {
				throw new Error('leader not ready');
			}
		}

		public testOne(): void {
			kinds.push(this.context.sniffers.get(11)?.kind);
		}
	}

	const first = await runMeshSuite(Flaky, { context });
	const second = await runMeshSuite(Flaky, { context });

	assert.equal(errorText(first.setUpClassError), 'leader not ready');
	assert.equal(suitePassed(second), true);
	assert.deepEqual(kinds, ['serial-802.15.4']);
	assert.deepEqual(readJson(path.join(classDirectory(dir, 'Flaky'), 'results.json')), {
		Flaky: { suite_id: null, testOne: { setUp: true, test: true, tearDown: true, case_id: null } }
	});
	assert.ok(hasLogLine(consoleLines, 'info', `    testOne${'.'.repeat(53)}PASS`));
	assert.equal(
		consoleLines.filter((line) => line.endsWith(`] [info] Flaky${'.'.repeat(46)}FAILED SETUPCLASS`)).length,
		1
	);
});

test('classes sharing a run each get the serial sniffer', async () => {
	const dir = createTempDir();
	const ports: FakeSerialPort[] = [];
	const { context } = createTestContext(dir, {
		snifferFactories: [
			createSerialSnifferFactory({
				listPorts: async () => [{ path: '/dev/ttyACM0', vendorId: '1915' }],
				openPort: async () => {
					const port = new FakeSerialPort();
					ports.push(port);
					return port;
				}
			})
		]
	});
	const kinds: Array<string | undefined> = [];

	class CaptureSuite extends MeshTestCase {
		public async setUpClass(): Promise<void> {
			await this.snifferInit(11);
		}

		public testOne(): void {
			kinds.push(this.context.sniffers.get(11)?.kind);
		}
	}

	class CaptureSuiteAgain extends CaptureSuite {}

	const first = await runMeshSuite(CaptureSuite, { context });
	const second = await runMeshSuite(CaptureSuiteAgain, { context });

	assert.equal(suitePassed(first), true);
	assert.equal(suitePassed(second), true);
	assert.deepEqual(kinds, ['serial-802.15.4', 'serial-802.15.4']);
	assert.equal(ports.length, 2);
	assert.deepEqual(
		ports.map((port) => port.closed),
		[true, true]
	);
	assert.ok(fs.existsSync(path.join(classDirectory(dir, 'CaptureSuite'), 'sniffer_ch11.pcap')));
	assert.ok(fs.existsSync(path.join(classDirectory(dir, 'CaptureSuiteAgain'), 'sniffer_ch11.pcap')));
});

test('a setup failure closes visualization and the class log', async () => {
	const sessions: FakeVisualizationSession[] = [];
	const dir = createTempDir();
	const { context } = createTestContext(dir, {
		config: { visualizationHost: 'localhost:8997' },
		visualizationFactory: createFakeVisualizationFactory(sessions)
	});

	class VizSetupFails extends MeshTestCase {
		public setUpClass(): void {
			throw new Error('border router offline');
		}

		public testNever(): void {}
	}

	const outcome = await runMeshSuite(VizSetupFails, { context });
	const logPath = path.join(classDirectory(dir, 'VizSetupFails'), FRAMEWORK_LOG_FILE);
	const loggedBefore = fs.readFileSync(logPath, 'utf8');
	context.logger.info('after the class');

	assert.equal(errorText(outcome.setUpClassError), 'border router offline');
	assert.equal(sessions.length, 1);
	assert.deepEqual(sessions[0].events, ['title VizSetupFails.set_up', 'speed 1', 'unsubscribe', 'title ']);
	assert.equal(context.visualization.enabled, false);
	assert.equal(context.logger.sinkCount, 0);
	assert.equal(fs.readFileSync(logPath, 'utf8'), loggedBefore);
});

test('visualization follows the class through its lifecycle', async () => {
	const sessions: FakeVisualizationSession[] = [];
	const { context } = createTestContext(createTempDir(), {
		config: { visualizationHost: 'localhost:8997' },
		visualizationFactory: createFakeVisualizationFactory(sessions)
	});
	const node = new FakeVisualizableDevice(
		{ name: 'node', properties: { [EXT_ADDRESS_PROPERTY]: '[00124b0001abcdef]' } },
		1
	);

	class Viz extends MeshTestCase {
		public setUpClass(): void {
			this.addTestDevice(node);
		}

		public testOne(): void {}
	}

	const outcome = await runMeshSuite(Viz, { context });

	assert.equal(suitePassed(outcome), true);
	assert.equal(sessions.length, 1);
	assert.equal(sessions[0].host, 'localhost:8997');
	assert.deepEqual(sessions[0].events, [
		'title Viz.set_up',
		'speed 1',
		'add 1',
		'extaddr 1 124b0001abcdef',
		'title Viz.testOne',
		'title Viz.tear_down',
		'remove 1',
		'unsubscribe',
		'title '
	]);
	assert.equal(context.visualization.enabled, false);
});

test('a visualization host without a session factory only warns', async () => {
	const { context, consoleLines } = createTestContext(createTempDir(), { config: { visualizationHost: 'viz:1' } });

	class Headless extends MeshTestCase {
		public testOne(): void {}
	}

	const outcome = await runMeshSuite(Headless, { context });

	assert.equal(suitePassed(outcome), true);
	assert.ok(hasLogLine(consoleLines, 'warn', 'Visualization host viz:1 is configured but no session factory was provided.'));
});

test('results accumulate across classes of one run', async () => {
	const dir = createTempDir();
	const { context } = createTestContext(dir);

	class FirstSuite extends MeshTestCase {
		public testOne(): void {}
	}

	class SecondSuite extends MeshTestCase {
		public testTwo(): void {}
	}

	await runMeshSuite(FirstSuite, { context });
	await runMeshSuite(SecondSuite, { context });

	const results = readJson(path.join(classDirectory(dir, 'SecondSuite'), 'results.json'));
	assert.ok(results && typeof results === 'object');
	assert.deepEqual(Object.keys(results), ['FirstSuite', 'SecondSuite']);
});

test('an unknown test method fails in the test phase', async () => {
	const { context } = createTestContext(createTempDir());

	class Sparse extends MeshTestCase {
		public testOne(): void {}
	}

	const outcome = await runMeshSuite(Sparse, { context, only: ['testMissing'] });

	assert.equal(outcome.tests[0].failedPhase, 'test');
	assert.equal(errorText(outcome.tests[0].error), 'Sparse has no test method "testMissing".');
});

test('test methods are discovered base class first, in declaration order', () => {
	class BaseSuite extends MeshTestCase {
		public testBase(): void {}
		public helper(): void {}
	}

	class DerivedSuite extends BaseSuite {
		public testData = 1;

		public get testLabel(): string {
			return 'label';
		}

		public testDerived(): void {}
		public testBase(): void {}
	}

	assert.deepEqual(discoverTestMethods(DerivedSuite), ['testBase', 'testDerived']);
});
