import { classifyResult, type ResultLedger } from './resultLedger';

const RULE_WIDTH = 70;
const LABEL_WIDTH = 34;
const LINE_WIDTH = 68;

const RULE = '='.repeat(RULE_WIDTH);

function row(label: string, status: string): string {
	const paddedLabel = label.padEnd(LABEL_WIDTH, '.');
	return paddedLabel + status.padStart(LINE_WIDTH - paddedLabel.length, '.');
}

export function formatSummaryLines(ledger: ResultLedger): string[] {
	const lines = [RULE, `${'='.repeat(29)} SUMMARY ${'='.repeat(31)}`, RULE];

	for (const className of ledger.classNames()) {
		const entry = ledger.getClass(className);
		if (!entry) {
			continue;
		}
		if (entry.setupClass === false) {
			lines.push(row(className, 'FAILED SETUPCLASS'));
			continue;
		}

		lines.push(className);
		for (const [methodName, record] of entry.tests) {
			lines.push(row(`    ${methodName}`, classifyResult(record)));
		}
	}

	lines.push(RULE);
	return lines;
}

export function formatSetupClassFailureBanner(className: string): string[] {
	return [
		RULE,
		`${'='.repeat(20)} CHECK HARDWARE CONFIGURATION ${'='.repeat(19)}`,
		RULE,
		row(className, 'FAILED SETUPCLASS'),
		RULE
	];
}
