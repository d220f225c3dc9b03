const BYTE_UNITS = [
    // binary units first so "kib" is not read as "b"
    ['kib', 1024],
    ['mib', 1024 ** 2],
    ['gib', 1024 ** 3],
    ['kb', 1000],
    ['mb', 1000 ** 2],
    ['gb', 1000 ** 3],
    ['b', 1],
] as const;

/**
 * Converts a human-readable byte string to a number ("10mb" => 10000000, "2 KiB" => 2048).
 * A bare number is taken as bytes.
 *
 * @returns The byte count, or NaN if the input is not a size.
 */
export function fromHumanBytes(str: string): number {
    let numStr = str.trim().toLowerCase();
    if (!numStr) return Number.NaN;

    let multiplier = 1;
    for (const [unit, value] of BYTE_UNITS) {
        if (numStr.endsWith(unit)) {
            multiplier = value;
            numStr = numStr.slice(0, -unit.length).trim();
            break;
        }
    }

    return numStr ? Number(numStr) * multiplier : Number.NaN;
}
