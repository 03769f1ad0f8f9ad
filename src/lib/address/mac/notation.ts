import { ValidationError } from "../errors";

export const MAC_NOTATIONS = ["plain", "hyphen", "colon", "dot"] as const;
export type MACNotation = typeof MAC_NOTATIONS[number];

// whole string, one separator style per address
const NOTATION_REGEXES: Record<MACNotation, RegExp> = {
    plain: /^[0-9A-Fa-f]{12}$/,
    hyphen: /^([0-9A-Fa-f]{2}-){5}[0-9A-Fa-f]{2}$/,
    colon: /^([0-9A-Fa-f]{2}:){5}[0-9A-Fa-f]{2}$/,
    dot: /^([0-9A-Fa-f]{4}\.){2}[0-9A-Fa-f]{4}$/,
};

const NOT_DIGITS_REGEX = /[^0-9a-f]/g;
const TWO_DIGITS_REGEX = /[0-9a-f]{2}/g;
const FOUR_DIGITS_REGEX = /[0-9a-f]{4}/g;

export function detectNotation(input: string): MACNotation | undefined {
    return MAC_NOTATIONS.find((notation) => NOTATION_REGEXES[notation].test(input));
}

export function isValidNotation(input: unknown): boolean {
    if (typeof input == "string") {
        return detectNotation(input) != undefined;
    }

    return false;
}

/** Lowercases and removes everything that is not a hex digit, does not validate */
export function cleanNotation(input: string): string {
    return input.toLowerCase().replace(NOT_DIGITS_REGEX, "");
}

/**
 * Validates `input` against the plain, hyphen, colon and dot notations and
 * returns the 12 lowercase hex digits it holds.
 *
 * @throws {ValidationError} when no notation matches
 */
export function parseNotation(input: string): string {
    if (!isValidNotation(input)) {
        throw new ValidationError();
    }

    return cleanNotation(input);
}

/** Groups already normalized digits, e.g. `a0b1c2d3e4f5` -> `a0b1.c2d3.e4f5` */
export function formatNotation(digits: string, notation: MACNotation): string {
    switch (notation) {
        case "plain":
            return digits;
        case "hyphen":
            return (digits.match(TWO_DIGITS_REGEX) ?? []).join("-");
        case "colon":
            return (digits.match(TWO_DIGITS_REGEX) ?? []).join(":");
        case "dot":
            return (digits.match(FOUR_DIGITS_REGEX) ?? []).join(".");
    }
}
