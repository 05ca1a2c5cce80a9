/**
 * @fileoverview Roman numeral recognition
 *
 * @module latin-curator/domain/patterns/romanNumerals
 */

const kROMAN_NUMERAL = /^(?=[MDCLXVI])M{0,4}(?:CM|CD|D?C{0,3})(?:XC|XL|L?X{0,3})(?:IX|IV|V?I{0,3})$/;

export interface RomanNumeralOptions {
    /** Accept lowercase numerals ("xiv"). Defaults to true. */
    readonly ignoreCase?: boolean;
}

/**
 * True when the token is a well-formed Roman numeral (I to MMMMCMXCIX).
 *
 * "IIII" and "VX" are rejected; so is the empty string.
 */
export function isRomanNumeral(token: string, options: RomanNumeralOptions = {}): boolean {
    const candidate = options.ignoreCase === false ? token : token.toUpperCase();
    return kROMAN_NUMERAL.test(candidate);
}
