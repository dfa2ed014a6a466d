import { HarnessError } from './HarnessError';

/**
 * Error codes for hardware that could not be reached or claimed.
 */
export type HardwareErrorCode = 'HARDWARE_NOT_FOUND' | 'SNIFFER_UNAVAILABLE' | 'SNIFFER_IO';

/**
 * Raised by device and sniffer setup when the bench does not provide the
 * hardware a test class asked for. Class setup treats it as
 * "hardware unavailable" rather than a configuration error.
 */
export class HardwareError extends HarnessError {
	public readonly deviceId?: string;

	public constructor(options: { code: HardwareErrorCode; message: string; deviceId?: string; cause?: unknown }) {
		super(options.code, options.message, options.cause);
		this.name = 'HardwareError';
		this.deviceId = options.deviceId;
	}
}

const UNAVAILABLE_CODES: ReadonlySet<string> = new Set<HardwareErrorCode>(['HARDWARE_NOT_FOUND', 'SNIFFER_UNAVAILABLE']);

const UNAVAILABLE_PATTERNS: RegExp[] = [
	/requires package "serialport"/i,
	/no .*(device|board|dongle|sniffer) found/i,
	/file not found/i,
	/no such file or directory/i,
	/access is denied/i,
	/access denied/i,
	/permission denied/i
];

export function isHardwareUnavailableError(error: unknown): boolean {
	if (error instanceof HarnessError) {
		return UNAVAILABLE_CODES.has(error.code);
	}
	const message = error instanceof Error ? error.message : String(error);
	return UNAVAILABLE_PATTERNS.some((pattern) => pattern.test(message));
}

export function errorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}
