const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Plain decimal notation only (`70`, `-5`, `25.5`); hex, binary, exponent and
 * `Infinity` spellings give null
 */
export function parseDecimal(raw: string): number | null {
    const text = raw.trim();
    return DECIMAL_PATTERN.test(text) ? Number(text) : null;
}
