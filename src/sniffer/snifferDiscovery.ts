export interface SerialCandidate {
	path: string;
	manufacturer?: string;
	serialNumber?: string;
	pnpId?: string;
	vendorId?: string;
	productId?: string;
}

export type SerialPortLister = () => Promise<SerialCandidate[]>;

/** USB vendor id of the 802.15.4 sniffer dongles the harness drives. */
export const SNIFFER_USB_VENDOR_ID = '1915';

export async function listSerialCandidates(): Promise<SerialCandidate[]> {
	try {
		// eslint-disable-next-line @typescript-eslint/no-var-requires
		const mod = require('serialport') as {
			SerialPort?: { list: () => Promise<SerialCandidate[]> };
		};
		if (!mod.SerialPort || typeof mod.SerialPort.list !== 'function') {
			return [];
		}

		return await mod.SerialPort.list();
	} catch {
		return [];
	}
}

export function isSnifferCandidate(candidate: SerialCandidate): boolean {
	if (candidate.vendorId?.toLowerCase() === SNIFFER_USB_VENDOR_ID) {
		return true;
	}
	return /nordic/i.test(candidate.manufacturer ?? '');
}

/** Sniffer dongles not yet claimed by another channel, in port-path order. */
export async function listSnifferCandidates(
	claimedPaths: ReadonlySet<string>,
	listPorts: SerialPortLister = listSerialCandidates
): Promise<SerialCandidate[]> {
	const candidates = await listPorts();
	return candidates
		.filter((candidate) => isSnifferCandidate(candidate) && !claimedPaths.has(candidate.path))
		.sort((a, b) => a.path.localeCompare(b.path));
}
