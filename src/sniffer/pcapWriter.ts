/** LINKTYPE_IEEE802_15_4_WITHFCS */
export const PCAP_LINKTYPE_IEEE802_15_4_WITHFCS = 195;

const PCAP_MAGIC = 0xa1b2c3d4;
const PCAP_VERSION_MAJOR = 2;
const PCAP_VERSION_MINOR = 4;
const PCAP_SNAPLEN = 65_535;
export const PCAP_GLOBAL_HEADER_BYTES = 24;
export const PCAP_RECORD_HEADER_BYTES = 16;

export interface SnifferFrame {
	payload: Uint8Array;
	rssi: number;
	lqi: number;
	/** Radio timestamp reported by the dongle, microseconds since its boot. */
	deviceTimeUs: number;
}

export function encodePcapGlobalHeader(linkType = PCAP_LINKTYPE_IEEE802_15_4_WITHFCS): Buffer {
	const header = Buffer.alloc(PCAP_GLOBAL_HEADER_BYTES);
	header.writeUInt32LE(PCAP_MAGIC, 0);
	header.writeUInt16LE(PCAP_VERSION_MAJOR, 4);
	header.writeUInt16LE(PCAP_VERSION_MINOR, 6);
	header.writeInt32LE(0, 8);
	header.writeUInt32LE(0, 12);
	header.writeUInt32LE(PCAP_SNAPLEN, 16);
	header.writeUInt32LE(linkType, 20);
	return header;
}

export function encodePcapRecord(payload: Uint8Array, timestampMs: number): Buffer {
	const record = Buffer.alloc(PCAP_RECORD_HEADER_BYTES + payload.length);
	const wholeMs = Math.max(0, Math.floor(timestampMs));
	record.writeUInt32LE(Math.floor(wholeMs / 1000), 0);
	record.writeUInt32LE((wholeMs % 1000) * 1000, 4);
	record.writeUInt32LE(payload.length, 8);
	record.writeUInt32LE(payload.length, 12);
	record.set(payload, PCAP_RECORD_HEADER_BYTES);
	return record;
}

const RECEIVED_LINE = /^received:\s*([0-9a-f]+)\s+power:\s*(-?\d+)\s+lqi:\s*(\d+)\s+time:\s*(\d+)\s*$/i;

/** Parses one `received:` line of the dongle's text protocol. */
export function parseSnifferLine(line: string): SnifferFrame | undefined {
	const match = RECEIVED_LINE.exec(line.trim());
	if (!match || match[1].length % 2 !== 0) {
		return undefined;
	}
	return {
		payload: new Uint8Array(Buffer.from(match[1], 'hex')),
		rssi: Number.parseInt(match[2], 10),
		lqi: Number.parseInt(match[3], 10),
		deviceTimeUs: Number.parseInt(match[4], 10)
	};
}
