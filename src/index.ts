export {
	HierarchicalLogger,
	NoopLogger,
	configureFrameworkLogger,
	consoleLevelForVerbosity,
	createFileSink,
	createLineSink,
	getDeviceLogger
} from './diagnostics/logger';
export type { ConsoleVerbosity, LogLevel, LogSink, Logger } from './diagnostics/logger';
export {
	mergeHarnessConfig,
	readHarnessConfig,
	setConsoleVerbosity,
	setMultiSourceSettleMs,
	setOutputDirectory,
	setVisualizationHost
} from './config/harnessConfig';
export type { HarnessConfigSnapshot } from './config/harnessConfig';
export { HarnessError } from './errors/HarnessError';
export { HardwareError, isHardwareUnavailableError } from './errors/HardwareError';
export type { HardwareErrorCode } from './errors/HardwareError';
export { EXT_ADDRESS_PROPERTY, isNetworkVisualizable, parseExtAddress } from './device/meshDevice';
export type { MeshDevice, NetworkVisualizable, VisualizableMeshDevice } from './device/meshDevice';
export { DeviceRegistry } from './device/deviceRegistry';
export { TaskQueue } from './device/taskQueue';
export { ResultLedger, RESULTS_FILE_NAME, SUITE_ID, classifyResult } from './results/resultLedger';
export type { ResultRecord, TestClassification, TrackingId } from './results/resultLedger';
export { formatSummaryLines } from './results/summaryTable';
export { NullSniffer } from './sniffer/snifferHandle';
export type { SnifferFactory, SnifferHandle, SnifferStats } from './sniffer/snifferHandle';
export { SnifferRegistry } from './sniffer/snifferRegistry';
export { SerialSniffer, createSerialSnifferFactory } from './sniffer/serialSniffer';
export { VisualizationBridge } from './visualization/visualizationSession';
export type { VisualizationSession, VisualizationSessionFactory } from './visualization/visualizationSession';
export { HarnessRunContext } from './harness/runContext';
export type { HarnessRunContextOptions } from './harness/runContext';
export { MeshTestCase, discoverTestMethods } from './harness/meshTestCase';
export type { MeshTestCaseClass, StressTestOptions } from './harness/meshTestCase';
export type { MultiSourcePingOptions, PingOptions } from './harness/pingAssertions';
export { MeshSuiteLifecycle } from './harness/suiteLifecycle';
export { runMeshSuite, suitePassed } from './harness/suiteRunner';
export type { SuiteOutcome, TestOutcome } from './harness/suiteRunner';
export { registerMeshSuite } from './harness/nodeTestBridge';
export { FakeMeshDevice, FakeVisualizableDevice } from './mock/fakeMeshDevice';
export { FakeSniffer, createFakeSnifferFactory } from './mock/fakeSniffer';
export { FakeVisualizationSession, createFakeVisualizationFactory } from './mock/fakeVisualizationSession';
