import { errorMessage } from '../errors/HardwareError';

/**
 * Serial queue behind the dispatch-then-wait contract shared by devices and
 * sniffers: operations are enqueued without awaiting, and
 * `waitForCompletion()` drains the queue and reports the first failure since
 * the previous wait.
 */
export class TaskQueue {
	private tail: Promise<void> = Promise.resolve();
	private firstError: string | undefined;
	private pendingCount = 0;

	public enqueue(label: string, task: () => Promise<void> | void): void {
		this.pendingCount += 1;
		this.tail = this.tail
			.then(() => task())
			.catch((error: unknown) => {
				this.firstError ??= `${label} failed: ${errorMessage(error)}`;
			})
			.finally(() => {
				this.pendingCount -= 1;
			});
	}

	public get pending(): number {
		return this.pendingCount;
	}

	public async waitForCompletion(): Promise<string | undefined> {
		await this.tail;
		const error = this.firstError;
		this.firstError = undefined;
		return error;
	}
}
