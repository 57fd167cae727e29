export enum ApduCase {
	Invalid = 0,
	Case1 = 1, // Header only
	Case2 = 2, // Le
	Case3 = 3, // Lc + Data
	Case4 = 4, // Lc + Data + Le
}
