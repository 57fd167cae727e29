import pino, {
	type DestinationStream,
	type LevelWithSilent,
	type Logger,
} from "pino";
import type { CommandApdu } from "../core/CommandApdu.js";
import { ApduCase } from "../core/enums/ApduCase.js";
import { toHex } from "../helper/HexHelper.js";

export type ApduLogDirection = "Received" | "Sent";

export interface ApduLoggerConfig {
	enabled?: boolean;
	level?: LevelWithSilent;
	name?: string;
	maxHexBytes?: number;
	/** Where JSON lines go. Defaults to stdout. */
	destination?: DestinationStream;
}

function bytesToHex(bytes: Uint8Array, maxHexBytes: number): string {
	const len = bytes.length;
	const max = Math.max(0, maxHexBytes);
	const slice = len <= max ? bytes : bytes.subarray(0, max);
	const suffix = len <= max ? "" : `...(+${String(len - max)} bytes)`;
	return `${toHex(slice)}${suffix}`;
}

export class ApduLogger {
	static disabled(): ApduLogger {
		return new ApduLogger(pino({ enabled: false }), 0);
	}

	static create(config: ApduLoggerConfig | undefined): ApduLogger {
		const enabled = config?.enabled ?? false;
		if (!enabled) return ApduLogger.disabled();

		const level = config?.level ?? "debug";
		const name = config?.name ?? "apdu";
		const maxHexBytes = config?.maxHexBytes ?? 64 * 1024;

		const options = { level, base: { name } };
		const logger = config?.destination
			? pino(options, config.destination)
			: pino(options);

		return new ApduLogger(logger, maxHexBytes);
	}

	private constructor(
		public readonly logger: Logger,
		private readonly maxHexBytes: number,
	) {}

	/**
	 * Logs the decoded fields of an APDU. Malformed APDUs go out at warn
	 * level with the reason they failed classification.
	 */
	logApdu(
		direction: ApduLogDirection,
		apdu: CommandApdu,
		meta?: Record<string, unknown>,
	): void {
		const layout = apdu.layout;
		const hex = bytesToHex(apdu.raw(), this.maxHexBytes);

		if (layout.kind === ApduCase.Invalid) {
			this.logger.warn(
				{
					dir: direction,
					byteLength: apdu.length,
					hex,
					reason: layout.reason,
					...meta,
				},
				"invalid apdu",
			);
			return;
		}

		this.logger.debug(
			{
				dir: direction,
				case: layout.kind,
				encoding: apdu.encoding,
				cla: apdu.cla(),
				ins: apdu.ins(),
				p1: apdu.p1(),
				p2: apdu.p2(),
				lc: apdu.lc(),
				le: apdu.leOrZero(),
				byteLength: apdu.length,
				hex,
				...meta,
			},
			"apdu",
		);
	}

	logBytes(
		direction: ApduLogDirection,
		bytes: Uint8Array,
		meta?: Record<string, unknown>,
	): void {
		this.logger.trace(
			{
				dir: direction,
				byteLength: bytes.length,
				hex: bytesToHex(bytes, this.maxHexBytes),
				...meta,
			},
			"bytes",
		);
	}

	flush(): void {
		this.logger.flush();
	}
}
