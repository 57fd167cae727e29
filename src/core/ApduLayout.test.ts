import { describe, expect, it } from "vitest";
import {
	bodyOffset,
	classifyApdu,
	locateFields,
	maxLe,
	remapLe,
} from "./ApduLayout.js";
import { ApduCase } from "./enums/ApduCase.js";
import { LengthEncoding } from "./enums/LengthEncoding.js";

const HEADER = [0x00, 0xa4, 0x04, 0x00];

function classify(...body: number[]) {
	return classifyApdu(Buffer.from([...HEADER, ...body]));
}

describe("classifyApdu", () => {
	it("rejects sequences shorter than the header", () => {
		expect(classifyApdu(Buffer.alloc(0))).toEqual({
			kind: ApduCase.Invalid,
			reason: "APDU too short: 0 bytes, header needs 4",
		});
		expect(classifyApdu(Buffer.from([0x00, 0xa4, 0x04])).kind).toBe(
			ApduCase.Invalid,
		);
	});

	it("classifies a bare header as Case 1", () => {
		expect(classify()).toEqual({ kind: ApduCase.Case1 });
	});

	it("classifies five bytes as standard Case 2", () => {
		expect(classify(0x05)).toEqual({
			kind: ApduCase.Case2,
			encoding: LengthEncoding.Standard,
			le: 0x05,
		});
		expect(classify(0x00)).toEqual({
			kind: ApduCase.Case2,
			encoding: LengthEncoding.Standard,
			le: 0x00,
		});
	});

	it("classifies seven bytes behind a zero marker as extended Case 2", () => {
		expect(classify(0x00, 0x12, 0x34)).toEqual({
			kind: ApduCase.Case2,
			encoding: LengthEncoding.Extended,
			le: 0x1234,
		});
	});

	it("rejects a zero marker with no room for the two-byte Lc", () => {
		expect(classify(0x00, 0x00)).toEqual({
			kind: ApduCase.Invalid,
			reason: "Extended APDU too short for Lc: 6 bytes",
		});
	});

	it("classifies standard Case 3 and Case 4", () => {
		expect(classify(0x02, 0xaa, 0xbb)).toEqual({
			kind: ApduCase.Case3,
			encoding: LengthEncoding.Standard,
			lc: 2,
		});
		expect(classify(0x02, 0xaa, 0xbb, 0x10)).toEqual({
			kind: ApduCase.Case4,
			encoding: LengthEncoding.Standard,
			lc: 2,
			le: 0x10,
		});
	});

	it("reads a standard Lc of 0x80 or more as unsigned", () => {
		const data = new Array<number>(0x80).fill(0x55);
		expect(classify(0x80, ...data)).toEqual({
			kind: ApduCase.Case3,
			encoding: LengthEncoding.Standard,
			lc: 0x80,
		});
	});

	it("rejects a standard Lc that disagrees with the length", () => {
		expect(classify(0x02, 0xaa)).toEqual({
			kind: ApduCase.Invalid,
			reason: "Standard Lc=2 does not match APDU length 6",
		});
	});

	it("classifies extended Case 3 and Case 4", () => {
		expect(classify(0x00, 0x00, 0x02, 0xaa, 0xbb)).toEqual({
			kind: ApduCase.Case3,
			encoding: LengthEncoding.Extended,
			lc: 2,
		});
		expect(classify(0x00, 0x00, 0x02, 0xaa, 0xbb, 0x01, 0x00)).toEqual({
			kind: ApduCase.Case4,
			encoding: LengthEncoding.Extended,
			lc: 2,
			le: 0x0100,
		});
	});

	it("reads a 16-bit extended Lc", () => {
		const data = new Array<number>(0x0100).fill(0x11);
		expect(classify(0x00, 0x01, 0x00, ...data)).toEqual({
			kind: ApduCase.Case3,
			encoding: LengthEncoding.Extended,
			lc: 0x0100,
		});
	});

	it("rejects an extended Lc that disagrees with the length", () => {
		expect(classify(0x00, 0x00, 0x03, 0xaa, 0xbb)).toEqual({
			kind: ApduCase.Invalid,
			reason: "Extended Lc=3 does not match APDU length 9",
		});
	});
});

describe("layout helpers", () => {
	it("maps encodings to their maximum Le and data offset", () => {
		expect(maxLe(LengthEncoding.Standard)).toBe(256);
		expect(maxLe(LengthEncoding.Extended)).toBe(65536);
		expect(bodyOffset(LengthEncoding.Standard)).toBe(5);
		expect(bodyOffset(LengthEncoding.Extended)).toBe(7);
	});

	it("remaps only a zero Le", () => {
		expect(remapLe(0, LengthEncoding.Standard)).toBe(256);
		expect(remapLe(0, LengthEncoding.Extended)).toBe(65536);
		expect(remapLe(5, LengthEncoding.Standard)).toBe(5);
	});
});

describe("locateFields", () => {
	it("returns null without a full header", () => {
		expect(locateFields(Buffer.from([0x00, 0xa4]))).toBeNull();
	});

	it("finds no Lc or Le in a bare header", () => {
		expect(locateFields(Buffer.from(HEADER))).toEqual({
			encoding: LengthEncoding.Standard,
			lc: 0,
			dataOffset: 5,
			le: null,
		});
	});

	it("locates standard fields", () => {
		expect(locateFields(Buffer.from([...HEADER, 0x02, 0xaa, 0xbb, 0x10]))).toEqual({
			encoding: LengthEncoding.Standard,
			lc: 2,
			dataOffset: 5,
			le: 0x10,
		});
	});

	it("locates extended Case 2 fields", () => {
		expect(locateFields(Buffer.from([...HEADER, 0x00, 0x00, 0x05]))).toEqual({
			encoding: LengthEncoding.Extended,
			lc: 0,
			dataOffset: 7,
			le: 0x05,
		});
	});

	it("goes by byte 5 where byte 4 says standard", () => {
		expect(
			locateFields(Buffer.from([...HEADER, 0x03, 0x00, 0x11, 0x22])),
		).toEqual({
			encoding: LengthEncoding.Extended,
			lc: 0x11,
			dataOffset: 7,
			le: 0x1122,
		});
	});
});
