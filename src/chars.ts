/**
 * arxml-access — XML character classes
 *
 * Code-point predicates for the tokeniser (XML 1.0 fifth edition §2.2–§2.3)
 * and for the serializer, which must know what an output encoding can carry.
 */

/** Inclusive code-point ranges of XML 1.0 NameStartChar, `:` included. */
const NAME_START_RANGES: ReadonlyArray<readonly [number, number]> = [
	[0x3a, 0x3a],
	[0x41, 0x5a],
	[0x5f, 0x5f],
	[0x61, 0x7a],
	[0xc0, 0xd6],
	[0xd8, 0xf6],
	[0xf8, 0x2ff],
	[0x370, 0x37d],
	[0x37f, 0x1fff],
	[0x200c, 0x200d],
	[0x2070, 0x218f],
	[0x2c00, 0x2fef],
	[0x3001, 0xd7ff],
	[0xf900, 0xfdcf],
	[0xfdf0, 0xfffd],
	[0x10000, 0xeffff],
];

/** Extra NameChar ranges on top of NameStartChar. */
const NAME_EXTRA_RANGES: ReadonlyArray<readonly [number, number]> = [
	[0x2d, 0x2e],
	[0x30, 0x39],
	[0xb7, 0xb7],
	[0x300, 0x36f],
	[0x203f, 0x2040],
];

function inRanges(code: number, ranges: ReadonlyArray<readonly [number, number]>): boolean {
	for (const [lo, hi] of ranges) {
		if (code < lo) return false;
		if (code <= hi) return true;
	}
	return false;
}

/** XML whitespace: space, tab, carriage-return, newline. */
export function isXmlWhitespace(code: number): boolean {
	return code === 0x20 || code === 0x09 || code === 0x0a || code === 0x0d;
}

export function isNameStartChar(code: number): boolean {
	// ASCII fast path; tags in ARXML are upper-case ASCII with hyphens
	if (code < 0x80) return (code >= 0x41 && code <= 0x5a) || (code >= 0x61 && code <= 0x7a) || code === 0x3a || code === 0x5f;
	return inRanges(code, NAME_START_RANGES);
}

export function isNameChar(code: number): boolean {
	return isNameStartChar(code) || inRanges(code, NAME_EXTRA_RANGES);
}

/** ASCII hex digit [0-9A-Fa-f]. */
export function isHexDigit(code: number): boolean {
	return (code >= 0x30 && code <= 0x39) || (code >= 0x41 && code <= 0x46) || (code >= 0x61 && code <= 0x66);
}

/** ASCII decimal digit [0-9]. */
export function isDecimalDigit(code: number): boolean {
	return code >= 0x30 && code <= 0x39;
}

/**
 * Legal XML 1.0 `Char` (production [2]). Character references to anything
 * else are not well-formed.
 */
export function isXmlChar(code: number): boolean {
	if (code === 0x09 || code === 0x0a || code === 0x0d) return true;
	if (code < 0x20) return false;
	if (code <= 0xd7ff) return true;
	if (code < 0xe000) return false;
	if (code <= 0xfffd) return true;
	return code >= 0x10000 && code <= 0x10ffff;
}

/** True when `code` fits in a single ISO-8859-1 byte. */
export function isLatin1(code: number): boolean {
	return code <= 0xff;
}
