export * from "./core/enums/ApduCase.js";
export * from "./core/enums/LengthEncoding.js";
export * from "./core/enums/LeConvention.js";
export * from "./core/ApduLayout.js";
export * from "./core/ApduEncoder.js";
export * from "./core/CommandApdu.js";

export * from "./helper/HexHelper.js";

export * from "./logging/ApduLogger.js";
