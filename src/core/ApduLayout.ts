import { ApduCase } from "./enums/ApduCase.js";
import { LengthEncoding } from "./enums/LengthEncoding.js";

export const HEADER_LENGTH = 4;

export interface InvalidLayout {
	readonly kind: ApduCase.Invalid;
	readonly reason: string;
}

export interface Case1Layout {
	readonly kind: ApduCase.Case1;
}

export interface Case2Layout {
	readonly kind: ApduCase.Case2;
	readonly encoding: LengthEncoding;
	/** Le field as encoded (0 stands for the maximum). */
	readonly le: number;
}

export interface Case3Layout {
	readonly kind: ApduCase.Case3;
	readonly encoding: LengthEncoding;
	readonly lc: number;
}

export interface Case4Layout {
	readonly kind: ApduCase.Case4;
	readonly encoding: LengthEncoding;
	readonly lc: number;
	/** Le field as encoded (0 stands for the maximum). */
	readonly le: number;
}

export type ApduLayout =
	| InvalidLayout
	| Case1Layout
	| Case2Layout
	| Case3Layout
	| Case4Layout;

/**
 * Where the accessors find Lc, data and Le. Unlike `ApduLayout`
 * the encoding here comes from byte 5: at least 7 bytes with 0x00 at
 * offset 5 read as extended.
 */
export interface ApduFields {
	readonly encoding: LengthEncoding;
	readonly lc: number;
	readonly dataOffset: number;
	/** Le field as encoded, or null when there is none. */
	readonly le: number | null;
}

/**
 * @description Largest value an Le field can stand for. An explicit zero Le
 * is read as this.
 * @param encoding The length encoding.
 * @returns 256 for standard, 65536 for extended.
 */
export function maxLe(encoding: LengthEncoding): number {
	return encoding === LengthEncoding.Extended ? 0x10000 : 0x100;
}

/**
 * @description Offset of the first data byte, after the header and the Lc field.
 * @param encoding The length encoding.
 * @returns 5 for standard, 7 for extended.
 */
export function bodyOffset(encoding: LengthEncoding): number {
	return encoding === LengthEncoding.Extended ? 7 : 5;
}

/**
 * @description Reads an Le field value as a response length.
 * @param le The Le field as encoded.
 * @param encoding The encoding the field was read under.
 * @returns `le`, or the encoding's maximum when `le` is 0.
 */
export function remapLe(le: number, encoding: LengthEncoding): number {
	return le === 0 ? maxLe(encoding) : le;
}

function readUInt16BE(bytes: Uint8Array, offset: number): number {
	return (bytes[offset] << 8) | bytes[offset + 1];
}

function invalid(reason: string): InvalidLayout {
	return { kind: ApduCase.Invalid, reason };
}

/**
 * @description Works out which of the four ISO/IEC 7816-4 command cases a byte sequence
 * is, and in which length encoding.
 *
 * There is no tag on the wire: the case follows from the total length and,
 * past the two short Case 2 forms, from whether byte 4 is the 0x00 marker
 * that announces a two-byte Lc.
 * @param bytes The APDU bytes.
 * @returns The case layout, or an invalid layout with the reason. Never throws.
 */
export function classifyApdu(bytes: Uint8Array): ApduLayout {
	const length = bytes.length;

	if (length < HEADER_LENGTH) {
		return invalid(
			`APDU too short: ${length.toString()} bytes, header needs ${HEADER_LENGTH.toString()}`,
		);
	}
	if (length === HEADER_LENGTH) {
		return { kind: ApduCase.Case1 };
	}
	if (length === 5) {
		return {
			kind: ApduCase.Case2,
			encoding: LengthEncoding.Standard,
			le: bytes[4],
		};
	}
	if (length === 7 && bytes[4] === 0x00) {
		return {
			kind: ApduCase.Case2,
			encoding: LengthEncoding.Extended,
			le: readUInt16BE(bytes, 5),
		};
	}

	if (bytes[4] === 0x00) {
		if (length < 7) {
			return invalid(
				`Extended APDU too short for Lc: ${length.toString()} bytes`,
			);
		}
		const lc = readUInt16BE(bytes, 5);
		if (length === 7 + lc) {
			return { kind: ApduCase.Case3, encoding: LengthEncoding.Extended, lc };
		}
		if (length === 7 + lc + 2) {
			return {
				kind: ApduCase.Case4,
				encoding: LengthEncoding.Extended,
				lc,
				le: readUInt16BE(bytes, length - 2),
			};
		}
		return invalid(
			`Extended Lc=${lc.toString()} does not match APDU length ${length.toString()}`,
		);
	}

	const lc = bytes[4];
	if (length === 5 + lc) {
		return { kind: ApduCase.Case3, encoding: LengthEncoding.Standard, lc };
	}
	if (length === 5 + lc + 1) {
		return {
			kind: ApduCase.Case4,
			encoding: LengthEncoding.Standard,
			lc,
			le: bytes[length - 1],
		};
	}
	return invalid(
		`Standard Lc=${lc.toString()} does not match APDU length ${length.toString()}`,
	);
}

/**
 * @description Locates the Lc, data and Le fields for the field accessors.
 * Does not check that the declared lengths agree with the byte count; that
 * is `classifyApdu`'s job.
 * @param bytes The APDU bytes.
 * @returns The field positions, or null when the header is incomplete.
 */
export function locateFields(bytes: Uint8Array): ApduFields | null {
	const length = bytes.length;
	if (length < HEADER_LENGTH) return null;

	const extended = length >= 7 && bytes[5] === 0x00;
	const encoding = extended ? LengthEncoding.Extended : LengthEncoding.Standard;

	let lc: number;
	if (
		length === HEADER_LENGTH ||
		(!extended && length === 5) ||
		(extended && length === 7)
	) {
		lc = 0;
	} else if (extended) {
		lc = readUInt16BE(bytes, 5);
	} else {
		lc = bytes[4];
	}

	let le: number | null;
	if (length === HEADER_LENGTH) {
		le = null;
	} else if (!extended && length === 5) {
		le = bytes[4];
	} else if (extended && length === 7) {
		le = readUInt16BE(bytes, 5);
	} else if (length === HEADER_LENGTH + (extended ? 3 : 1) + lc) {
		le = null;
	} else if (extended) {
		le = readUInt16BE(bytes, length - 2);
	} else {
		le = bytes[length - 1];
	}

	return { encoding, lc, dataOffset: bodyOffset(encoding), le };
}
