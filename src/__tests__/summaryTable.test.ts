import assert from 'node:assert/strict';
import test from 'node:test';
import { ResultLedger } from '../results/resultLedger';
import { formatSetupClassFailureBanner, formatSummaryLines } from '../results/summaryTable';

const RULE = '='.repeat(70);

test('summary lists each test with its classification', () => {
	const ledger = new ResultLedger();
	ledger.openClass('MeshPing', null);
	ledger.beginTest('MeshPing', 'test1', null);
	ledger.markPhase('MeshPing', 'test1', 'setUp');
	ledger.markPhase('MeshPing', 'test1', 'test');
	ledger.markPhase('MeshPing', 'test1', 'tearDown');
	ledger.beginTest('MeshPing', 'test2', null);
	ledger.markPhase('MeshPing', 'test2', 'setUp');
	ledger.markPhase('MeshPing', 'test2', 'tearDown');
	ledger.openClass('Broken', null);
	ledger.markSetupClassFailed('Broken');

	assert.deepEqual(formatSummaryLines(ledger), [
		RULE,
		`${'='.repeat(29)} SUMMARY ${'='.repeat(31)}`,
		RULE,
		'MeshPing',
		`    test1${'.'.repeat(55)}PASS`,
		`    test2${'.'.repeat(48)}FAILED TEST`,
		`Broken${'.'.repeat(45)}FAILED SETUPCLASS`,
		RULE
	]);
});

test('summary rows are 68 characters wide', () => {
	const ledger = new ResultLedger();
	ledger.openClass('MeshPing', null);
	ledger.beginTest('MeshPing', 'testRouterAttach', null);

	const row = formatSummaryLines(ledger)[4];
	assert.equal(row.length, 68);
	assert.ok(row.endsWith('.FAILED SETUP'));
});

test('setup failure banner names the class', () => {
	assert.deepEqual(formatSetupClassFailureBanner('BadConfig'), [
		RULE,
		`${'='.repeat(20)} CHECK HARDWARE CONFIGURATION ${'='.repeat(19)}`,
		RULE,
		`BadConfig${'.'.repeat(42)}FAILED SETUPCLASS`,
		RULE
	]);
});
