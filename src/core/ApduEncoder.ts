export interface CommandApduParts {
	cla: number;
	ins: number;
	p1: number;
	p2: number;
	/**
	 * Command data. Empty or missing means no Lc/data field. Plain numbers
	 * are stored modulo 256.
	 */
	data?: Uint8Array | readonly number[];
	/** Maximum number of bytes expected in the response (1-65536). */
	ne?: number;
	/** Force the extended length encoding even when the values fit in one byte. */
	extended?: boolean;
}

const MAX_STANDARD_NC = 0xff;
const MAX_STANDARD_NE = 0x100;
const MAX_EXTENDED_NC = 0xffff;
const MAX_EXTENDED_NE = 0x10000;

function checkByte(name: string, value: number): void {
	if (!Number.isInteger(value) || value < 0 || value > 0xff) {
		throw new Error(`${name} must be 0-255, got ${value.toString()}`);
	}
}

/**
 * @description Builds the wire form of a command APDU from its fields. Picks
 * the standard encoding unless the data or Ne do not fit it, or `extended` is
 * set. Ne equal to the encoding's maximum is written as zero.
 * @param parts Header bytes, optional data and optional Ne.
 * @returns The encoded APDU.
 */
export function encodeCommandApdu(parts: CommandApduParts): Buffer {
	checkByte("CLA", parts.cla);
	checkByte("INS", parts.ins);
	checkByte("P1", parts.p1);
	checkByte("P2", parts.p2);

	const data = Buffer.from(parts.data ?? []);
	if (data.length > MAX_EXTENDED_NC) {
		throw new Error(
			`Data too large: ${data.length.toString()} bytes, max ${MAX_EXTENDED_NC.toString()}`,
		);
	}

	const ne = parts.ne;
	if (ne !== undefined) {
		if (!Number.isInteger(ne) || ne < 1 || ne > MAX_EXTENDED_NE) {
			throw new Error(
				`Ne must be 1-${MAX_EXTENDED_NE.toString()}, got ${ne.toString()}`,
			);
		}
	}

	const extended =
		(parts.extended ?? false) ||
		data.length > MAX_STANDARD_NC ||
		(ne !== undefined && ne > MAX_STANDARD_NE);

	const header = Buffer.from([parts.cla, parts.ins, parts.p1, parts.p2]);
	const chunks: Buffer[] = [header];

	if (extended) {
		// A single 0x00 marker precedes whichever length field comes first
		if (data.length > 0) {
			const lc = Buffer.alloc(3);
			lc.writeUInt16BE(data.length, 1);
			chunks.push(lc, data);
			if (ne !== undefined) {
				const le = Buffer.alloc(2);
				le.writeUInt16BE(ne & 0xffff, 0);
				chunks.push(le);
			}
		} else if (ne !== undefined) {
			const le = Buffer.alloc(3);
			le.writeUInt16BE(ne & 0xffff, 1);
			chunks.push(le);
		}
	} else {
		if (data.length > 0) {
			chunks.push(Buffer.from([data.length]), data);
		}
		if (ne !== undefined) {
			chunks.push(Buffer.from([ne & 0xff]));
		}
	}

	return Buffer.concat(chunks);
}
