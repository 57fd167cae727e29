import {
	HEADER_LENGTH,
	classifyApdu,
	locateFields,
	remapLe,
	type ApduFields,
	type ApduLayout,
} from "./ApduLayout.js";
import { encodeCommandApdu, type CommandApduParts } from "./ApduEncoder.js";
import { ApduCase } from "./enums/ApduCase.js";
import { LeConvention } from "./enums/LeConvention.js";
import { LengthEncoding } from "./enums/LengthEncoding.js";
import { formatByte, parseHexToBuffer, toHex } from "../helper/HexHelper.js";

/** Returned by `leOrAbsent()` when the APDU carries no Le field. */
export const LE_ABSENT = -1;

/**
 * Raw APDU bytes. Plain numbers are stored modulo 256, as `Buffer.from`
 * does: 256 becomes 0x00 and -1 becomes 0xFF.
 */
export type ApduBytes = Uint8Array | readonly number[];

/**
 * ISO/IEC 7816-4 command APDU over an owned copy of its bytes.
 *
 * ```
 * | CLA | INS | P1 | P2 | Lc | Data | Le |
 * |      header (4)     |  body (optional) |
 * ```
 *
 * Construction never fails; check `isValid()` before trusting the fields.
 * `isValid()`, `apduCase`, `encoding` and `describe()` go by the full
 * classification. The field accessors (`isExtended`, `lc`, `le*`,
 * `argumentData`) locate the length fields from byte 5 alone and do not
 * consult `isValid()`, so on some APDUs the two disagree; see
 * `locateFields`. Header and field accessors throw when fewer than four
 * bytes are present, and `argumentData` throws when Lc runs past the end.
 */
export class CommandApdu {
	private readonly bytes: Buffer;
	private readonly fields: ApduFields | null;
	public readonly layout: ApduLayout;

	constructor(data?: ApduBytes | null) {
		this.bytes = Buffer.from(data ?? []);
		this.layout = classifyApdu(this.bytes);
		this.fields = locateFields(this.bytes);
	}

	static fromBytes(data?: ApduBytes | null): CommandApdu {
		return new CommandApdu(data);
	}

	static fromHex(hex: string): CommandApdu {
		return new CommandApdu(parseHexToBuffer(hex));
	}

	static fromParts(parts: CommandApduParts): CommandApdu {
		return new CommandApdu(encodeCommandApdu(parts));
	}

	get length(): number {
		return this.bytes.length;
	}

	get apduCase(): ApduCase {
		return this.layout.kind;
	}

	/**
	 * Length encoding found by classification (the 0x00 marker at byte 4),
	 * null for an invalid APDU. A bare header counts as standard.
	 */
	get encoding(): LengthEncoding | null {
		const layout = this.layout;
		switch (layout.kind) {
			case ApduCase.Invalid:
				return null;
			case ApduCase.Case1:
				return LengthEncoding.Standard;
			default:
				return layout.encoding;
		}
	}

	isValid(): boolean {
		return this.layout.kind !== ApduCase.Invalid;
	}

	/**
	 * Throws with the classification reason unless the APDU is well formed.
	 */
	assertValid(): this {
		const layout = this.layout;
		if (layout.kind === ApduCase.Invalid) {
			throw new Error(`Invalid APDU: ${layout.reason}`);
		}
		return this;
	}

	/**
	 * True when there are at least 7 bytes and byte 5 is 0x00.
	 */
	isExtended(): boolean {
		return this.fields?.encoding === LengthEncoding.Extended;
	}

	cla(): number {
		return this.headerByte(0);
	}

	ins(): number {
		return this.headerByte(1);
	}

	p1(): number {
		return this.headerByte(2);
	}

	p2(): number {
		return this.headerByte(3);
	}

	/**
	 * Declared length of the data field, 0 when there is none.
	 */
	lc(): number {
		return this.requireFields().lc;
	}

	hasData(): boolean {
		return this.lc() !== 0;
	}

	/**
	 * Expected response length. 0 when no Le field is present; an explicit
	 * zero reads as 256 (standard) or 65536 (extended).
	 */
	leOrZero(): number {
		const fields = this.requireFields();
		return fields.le === null ? 0 : remapLe(fields.le, fields.encoding);
	}

	/**
	 * Le field as encoded, or `LE_ABSENT` when no Le field is present. Zero
	 * is returned as zero.
	 */
	leOrAbsent(): number {
		return this.requireFields().le ?? LE_ABSENT;
	}

	le(convention: LeConvention = LeConvention.ZeroRemapped): number {
		return convention === LeConvention.Raw
			? this.leOrAbsent()
			: this.leOrZero();
	}

	/**
	 * Copy of the data field; empty when `lc()` is 0.
	 */
	argumentData(): Buffer {
		const { lc, dataOffset } = this.requireFields();
		if (lc === 0) return Buffer.alloc(0);

		const end = dataOffset + lc;
		if (end > this.bytes.length) {
			throw new Error(
				`APDU too short for Lc=${lc.toString()}: data ends at ${end.toString()}, APDU has ${this.bytes.length.toString()} bytes`,
			);
		}
		return Buffer.from(this.bytes.subarray(dataOffset, end));
	}

	raw(): Buffer {
		return Buffer.from(this.bytes);
	}

	equals(other: CommandApdu): boolean {
		return this.bytes.equals(other.bytes);
	}

	toHex(separator = ""): string {
		return toHex(this.bytes, separator);
	}

	toString(): string {
		return this.toHex();
	}

	/**
	 * One-line summary, e.g. `CLA=00 INS=A4 P1=04 P2=00 Case3 Standard Lc=2`.
	 */
	describe(): string {
		const layout = this.layout;
		if (layout.kind === ApduCase.Invalid) {
			return `Invalid APDU [${this.toHex(" ")}]: ${layout.reason}`;
		}

		const header = `CLA=${formatByte(this.cla())} INS=${formatByte(this.ins())} P1=${formatByte(this.p1())} P2=${formatByte(this.p2())}`;
		switch (layout.kind) {
			case ApduCase.Case1:
				return `${header} Case1`;
			case ApduCase.Case2:
				return `${header} Case2 ${layout.encoding} Le=${remapLe(layout.le, layout.encoding).toString()}`;
			case ApduCase.Case3:
				return `${header} Case3 ${layout.encoding} Lc=${layout.lc.toString()}`;
			case ApduCase.Case4:
				return `${header} Case4 ${layout.encoding} Lc=${layout.lc.toString()} Le=${remapLe(layout.le, layout.encoding).toString()}`;
		}
	}

	private headerByte(index: number): number {
		if (this.bytes.length < HEADER_LENGTH) {
			throw new Error(
				`APDU too short for header: ${this.bytes.length.toString()} bytes`,
			);
		}
		return this.bytes[index];
	}

	private requireFields(): ApduFields {
		if (this.fields === null) {
			throw new Error(
				`APDU too short for header: ${this.bytes.length.toString()} bytes`,
			);
		}
		return this.fields;
	}
}
