/**
 * @description Strips whitespace so "00 A4 04 00" and "00A40400" read the same.
 * @param input The hex string.
 * @returns The hex string without whitespace.
 */
export function cleanHex(input: string): string {
	return input.replace(/\s+/g, "");
}

/**
 * @description Checks for hex digits only, in whole bytes.
 * @param hex The hex string, already cleaned.
 * @returns Whether the string is even-length hex.
 */
export function isValidEvenHex(hex: string): boolean {
	return /^[0-9a-fA-F]*$/.test(hex) && hex.length % 2 === 0;
}

/**
 * @description Parses a hex string (whitespace allowed, optional 0x prefix)
 * into bytes. Throws on malformed input.
 * @param input The hex string.
 * @returns The decoded bytes.
 */
export function parseHexToBuffer(input: string): Buffer {
	let hex = cleanHex(input);
	if (hex.startsWith("0x") || hex.startsWith("0X")) {
		hex = hex.slice(2);
	}
	if (!isValidEvenHex(hex)) {
		throw new Error(`Invalid hex format (must be even-length hex): "${input}"`);
	}
	return Buffer.from(hex, "hex");
}

/**
 * @description Formats one byte as two uppercase hex digits.
 * @param value The byte value; only the low 8 bits are used.
 * @returns The formatted byte, e.g. "0A".
 */
export function formatByte(value: number): string {
	return (value & 0xff).toString(16).toUpperCase().padStart(2, "0");
}

/**
 * @description Formats bytes as uppercase hex.
 * @param bytes The bytes to format.
 * @param separator Placed between bytes.
 * @returns The hex string.
 */
export function toHex(bytes: Uint8Array, separator = ""): string {
	const out: string[] = [];
	for (const byte of bytes) {
		out.push(formatByte(byte));
	}
	return out.join(separator);
}
