/**
 * How `CommandApdu.le()` reports the Le field.
 *
 * - `ZeroRemapped`: 0 when absent, an explicit 0 reads as 256 / 65536.
 * - `Raw`: -1 when absent, the field value as encoded otherwise.
 */
export enum LeConvention {
	ZeroRemapped = "ZeroRemapped",
	Raw = "Raw",
}
