export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

const PREFIXED: Record<string, { radix: string; digits: RegExp }> = {
    x: { radix: '0x', digits: /^_?[0-9a-f]+(_[0-9a-f]+)*$/i },
    o: { radix: '0o', digits: /^_?[0-7]+(_[0-7]+)*$/ },
    b: { radix: '0b', digits: /^_?[01]+(_[01]+)*$/ },
};

const DECIMAL = /^[0-9]+(_[0-9]+)*$/;
const LEGACY_OCTAL = /^_?[0-7]+(_[0-7]+)*$/;

/**
 * Parses an integer literal into a signed 64-bit value, detecting the base
 * from its prefix: `0x`, `0o`, `0b`, or a bare leading `0` for octal.
 * Underscore separators may sit between digits, or right after a prefix.
 * Returns undefined when the text is malformed or out of range.
 */
export function parseInt64(literal: string): bigint | undefined {
    let text = literal;
    let negative = false;
    if (text.startsWith('+') || text.startsWith('-')) {
        negative = text.startsWith('-');
        text = text.slice(1);
    }

    const magnitude = parseMagnitude(text);
    if (magnitude === undefined) return undefined;

    const value = negative ? -magnitude : magnitude;
    if (value < INT64_MIN || value > INT64_MAX) return undefined;
    return value;
}

function parseMagnitude(text: string): bigint | undefined {
    if (DECIMAL.test(text) && (text.length === 1 || text[0] !== '0')) {
        return BigInt(text.replace(/_/g, ''));
    }

    if (text.length > 2 && text[0] === '0') {
        const base = PREFIXED[text[1].toLowerCase()];
        if (base) {
            const body = text.slice(2);
            return base.digits.test(body) ? BigInt(base.radix + body.replace(/_/g, '')) : undefined;
        }
    }

    if (text.length > 1 && text[0] === '0') {
        const body = text.slice(1);
        return LEGACY_OCTAL.test(body) ? BigInt('0o' + body.replace(/_/g, '')) : undefined;
    }

    return undefined;
}
