export enum LengthEncoding {
	Standard = "Standard",
	Extended = "Extended",
}
