import type { MeshTestCase, MeshTestCaseClass } from './meshTestCase';
import { HarnessRunContext } from './runContext';
import { MeshSuiteLifecycle } from './suiteLifecycle';

export type TestPhase = 'setUp' | 'test' | 'tearDown';

export interface TestOutcome {
	name: string;
	status: 'passed' | 'failed';
	/** Phase whose error is reported in `error`. */
	failedPhase?: TestPhase;
	error?: unknown;
}

export interface SuiteOutcome {
	className: string;
	outputDirectory?: string;
	setUpClassError?: unknown;
	tearDownClassError?: unknown;
	tests: TestOutcome[];
}

export interface RunMeshSuiteOptions {
	context?: HarnessRunContext;
	/** Subset of test methods to run, in the given order. */
	only?: readonly string[];
}

/**
 * setUp, test and tearDown of one method. A failed setUp skips the test and
 * its tearDown; a failed test still runs tearDown. The test's error wins
 * over a tearDown error.
 */
export async function runTestMethod<T extends MeshTestCase>(
	lifecycle: MeshSuiteLifecycle<T>,
	methodName: string
): Promise<TestOutcome> {
	try {
		await lifecycle.setUp(methodName);
	} catch (error) {
		return { name: methodName, status: 'failed', failedPhase: 'setUp', error };
	}

	let outcome: TestOutcome = { name: methodName, status: 'passed' };
	try {
		await lifecycle.runTest(methodName);
	} catch (error) {
		outcome = { name: methodName, status: 'failed', failedPhase: 'test', error };
	}

	try {
		await lifecycle.tearDown(methodName);
	} catch (error) {
		if (outcome.status === 'passed') {
			outcome = { name: methodName, status: 'failed', failedPhase: 'tearDown', error };
		}
	}
	return outcome;
}

/** Runs one fixture class start to finish, xUnit style. */
export async function runMeshSuite<T extends MeshTestCase>(
	testClass: MeshTestCaseClass<T>,
	options: RunMeshSuiteOptions = {}
): Promise<SuiteOutcome> {
	const context = options.context ?? new HarnessRunContext();
	const lifecycle = new MeshSuiteLifecycle(testClass, context);
	const outcome: SuiteOutcome = { className: lifecycle.className, tests: [] };

	try {
		await lifecycle.setUpClass();
	} catch (error) {
		outcome.outputDirectory = context.outputDirectory;
		outcome.setUpClassError = error;
		return outcome;
	}
	outcome.outputDirectory = context.outputDirectory;

	const methodNames = options.only ?? lifecycle.testMethodNames();
	for (const methodName of methodNames) {
		outcome.tests.push(await runTestMethod(lifecycle, methodName));
	}

	try {
		await lifecycle.tearDownClass();
	} catch (error) {
		outcome.tearDownClassError = error;
	}
	return outcome;
}

export function suitePassed(outcome: SuiteOutcome): boolean {
	return (
		outcome.setUpClassError === undefined &&
		outcome.tearDownClassError === undefined &&
		outcome.tests.every((test) => test.status === 'passed')
	);
}
