import * as path from 'node:path';
import type { ConsoleVerbosity } from '../diagnostics/logger';
import { parseEnvInteger, sanitizeEnum, sanitizeNumber, sanitizeOptionalString } from './sanitizers';

export const OUTPUT_DIRECTORY_ENV = 'MESH_HARNESS_OUTPUT_DIRECTORY';
export const VISUALIZATION_HOST_ENV = 'MESH_HARNESS_VISUALIZATION_HOST';
export const VERBOSITY_ENV = 'MESH_HARNESS_VERBOSITY';
export const MULTI_SOURCE_SETTLE_ENV = 'MESH_HARNESS_MULTI_SOURCE_SETTLE_MS';
export const SNIFFER_PORT_ENV = 'MESH_HARNESS_SNIFFER_PORT';

/** Relative to the working directory when no override is set. */
export const DEFAULT_OUTPUT_DIRECTORY = path.join('artifacts', 'results');
export const DEFAULT_CONSOLE_VERBOSITY: ConsoleVerbosity = 1;
/** One board family drops pings when a second sender starts too soon. */
export const DEFAULT_MULTI_SOURCE_SETTLE_MS = 2_000;

const VERBOSITY_LEVELS: readonly ConsoleVerbosity[] = [0, 1, 2];

export interface HarnessConfigSnapshot {
	outputDirectory: string;
	visualizationHost?: string;
	consoleVerbosity: ConsoleVerbosity;
	multiSourceSettleMs: number;
	snifferPort?: string;
}

export function readHarnessConfig(env: NodeJS.ProcessEnv = process.env): HarnessConfigSnapshot {
	const outputOverride = sanitizeOptionalString(env[OUTPUT_DIRECTORY_ENV]);
	return {
		outputDirectory: path.resolve(process.cwd(), outputOverride ?? DEFAULT_OUTPUT_DIRECTORY),
		visualizationHost: sanitizeOptionalString(env[VISUALIZATION_HOST_ENV]),
		consoleVerbosity: sanitizeEnum(parseEnvInteger(env[VERBOSITY_ENV]), VERBOSITY_LEVELS, DEFAULT_CONSOLE_VERBOSITY),
		multiSourceSettleMs: sanitizeNumber(
			parseEnvInteger(env[MULTI_SOURCE_SETTLE_ENV]),
			DEFAULT_MULTI_SOURCE_SETTLE_MS,
			0
		),
		snifferPort: sanitizeOptionalString(env[SNIFFER_PORT_ENV])
	};
}

/** Layers explicit values over `base`; an override left `undefined` keeps the base value. */
export function mergeHarnessConfig(
	base: HarnessConfigSnapshot,
	overrides: Partial<HarnessConfigSnapshot> = {}
): HarnessConfigSnapshot {
	return {
		outputDirectory: overrides.outputDirectory ?? base.outputDirectory,
		visualizationHost: overrides.visualizationHost ?? base.visualizationHost,
		consoleVerbosity: overrides.consoleVerbosity ?? base.consoleVerbosity,
		multiSourceSettleMs: overrides.multiSourceSettleMs ?? base.multiSourceSettleMs,
		snifferPort: overrides.snifferPort ?? base.snifferPort
	};
}

/*
 * Process-wide setters. They write the environment so that every run context
 * created afterwards (and child processes) sees the same values; call them
 * before any class setup runs.
 */

export function setOutputDirectory(directory: string, env: NodeJS.ProcessEnv = process.env): void {
	env[OUTPUT_DIRECTORY_ENV] = directory;
}

export function setVisualizationHost(host: string | undefined, env: NodeJS.ProcessEnv = process.env): void {
	if (host === undefined) {
		delete env[VISUALIZATION_HOST_ENV];
		return;
	}
	env[VISUALIZATION_HOST_ENV] = host;
}

export function setConsoleVerbosity(verbosity: ConsoleVerbosity, env: NodeJS.ProcessEnv = process.env): void {
	env[VERBOSITY_ENV] = String(verbosity);
}

export function setMultiSourceSettleMs(settleMs: number, env: NodeJS.ProcessEnv = process.env): void {
	env[MULTI_SOURCE_SETTLE_ENV] = String(Math.max(0, Math.floor(settleMs)));
}
