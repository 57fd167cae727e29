import { ApduLogger, CommandApdu, LeConvention } from "../src/index.js";

function main() {
	const logger = ApduLogger.create({ enabled: true, level: "debug" });

	const select = CommandApdu.fromParts({
		cla: 0x00,
		ins: 0xa4,
		p1: 0x04,
		p2: 0x00,
		data: [0xa0, 0x00, 0x00, 0x00, 0x03, 0x10, 0x10],
		ne: 256,
	});
	console.log(select.toHex(" "));
	console.log(select.describe());
	logger.logApdu("Sent", select);

	const getResponse = CommandApdu.fromHex("00 C0 00 00 00");
	console.log(
		getResponse.leOrZero(),
		getResponse.le(LeConvention.Raw),
		getResponse.isExtended(),
	);

	const readBinary = CommandApdu.fromHex("00B0000000FFFF");
	console.log(readBinary.describe());

	const broken = CommandApdu.fromHex("00 DA 01 02 05 AA");
	if (!broken.isValid()) {
		console.log(broken.describe());
	}
	logger.logApdu("Received", broken);

	logger.flush();
}

main();
