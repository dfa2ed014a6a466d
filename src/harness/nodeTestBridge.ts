import { after, before, describe, it } from 'node:test';
import type { MeshTestCase, MeshTestCaseClass } from './meshTestCase';
import { discoverTestMethods } from './meshTestCase';
import { HarnessRunContext } from './runContext';
import { MeshSuiteLifecycle } from './suiteLifecycle';
import { runTestMethod } from './suiteRunner';

export interface RegisterMeshSuiteOptions {
	/** Shared run context, or a factory called when the class is set up. */
	context?: HarnessRunContext | (() => HarnessRunContext);
}

function resolveContext(option: RegisterMeshSuiteOptions['context']): HarnessRunContext {
	if (option instanceof HarnessRunContext) {
		return option;
	}
	return option ? option() : new HarnessRunContext();
}

/**
 * Registers a fixture class with `node:test`: class setup and teardown become
 * `before`/`after` hooks of a `describe` block and every test method an `it`.
 */
export function registerMeshSuite<T extends MeshTestCase>(
	testClass: MeshTestCaseClass<T>,
	options: RegisterMeshSuiteOptions = {}
): void {
	void describe(testClass.name, () => {
		let lifecycle: MeshSuiteLifecycle<T> | undefined;

		before(async () => {
			const candidate = new MeshSuiteLifecycle(testClass, resolveContext(options.context));
			await candidate.setUpClass();
			lifecycle = candidate;
		});

		for (const methodName of discoverTestMethods(testClass)) {
			void it(methodName, async () => {
				if (!lifecycle) {
					throw new Error(`${testClass.name} was not set up.`);
				}
				const outcome = await runTestMethod(lifecycle, methodName);
				if (outcome.status === 'failed') {
					throw outcome.error;
				}
			});
		}

		after(async () => {
			if (lifecycle) {
				await lifecycle.tearDownClass();
			}
		});
	});
}
