import { uint8_concat, uint8_fromHex, uint8_toBinary, uint8_toHex } from "../../binary/uint8-array";
import { BaseAddress } from "../base";
import { ValidationError } from "../errors";
import { type MACNotation, formatNotation, isValidNotation, parseNotation } from "./notation";

export const EXTENDED_IDENTIFIER_KINDS = ["unique", "local", "unknown"] as const;
export type ExtendedIdentifierKind = typeof EXTENDED_IDENTIFIER_KINDS[number];

const BROADCAST_DIGITS = "ffffffffffff";

/**
 * A 48-bit IEEE extended identifier.
 *
 * Extended identifiers are either EUIs, carrying an organizationally unique
 * identifier (OUI), or ELIs, carrying a company ID (CID). Both occupy the
 * first 24 bits; the last 24 bits are specific to the interface.
 */
export class MACAddress extends BaseAddress {
    static ADDRESS_LENGTH = 48;

    /** @throws {ValidationError} */
    static parse(input: string): string {
        return parseNotation(input);
    }

    static validate(input: unknown): boolean {
        return isValidNotation(input);
    }

    private readonly digits: string;

    constructor(input: string);
    constructor(input: Uint8Array);
    constructor(input: MACAddress);
    constructor(input: unknown) {
        super();
        if (typeof input == "string") {
            this.digits = MACAddress.parse(input);
        } else if (input instanceof MACAddress) {
            this.digits = input.digits;
        } else if (input instanceof Uint8Array && (input.byteLength * 8) == MACAddress.ADDRESS_LENGTH) {
            this.digits = uint8_toHex(input);
        } else {
            throw new ValidationError();
        }
    }

    get buffer(): Uint8Array {
        return uint8_fromHex(this.digits);
    }

    toPlainNotation(): string {
        return this.digits;
    }

    toHyphenNotation(): string {
        return formatNotation(this.digits, "hyphen");
    }

    toColonNotation(): string {
        return formatNotation(this.digits, "colon");
    }

    toDotNotation(): string {
        return formatNotation(this.digits, "dot");
    }

    toString(notation: MACNotation = "hyphen"): string {
        return formatNotation(this.digits, notation);
    }

    /** Most-significant bit of each octet first */
    toBinaryRepresentation(): string {
        return uint8_toBinary(this.buffer);
    }

    toDecimalRepresentation(): number {
        // 48 bits stay below Number.MAX_SAFE_INTEGER
        return parseInt(this.toBinaryRepresentation(), 2);
    }

    /** OUI or CID, then the interface specific part */
    toFragments(): [string, string] {
        return [this.digits.substring(0, 6), this.digits.substring(6)];
    }

    /**
     * `00` in the two least-significant bits of the first octet makes an EUI,
     * `1010` in its four least-significant bits an ELI. Checked in that order.
     */
    kind(): ExtendedIdentifierKind {
        let binary = this.toBinaryRepresentation();

        if (binary.substring(6, 8) == "00") {
            return "unique";
        } else if (binary.substring(4, 8) == "1010") {
            return "local";
        }

        return "unknown";
    }

    hasOui(): boolean {
        return this.kind() == "unique";
    }

    hasCid(): boolean {
        return this.kind() == "local";
    }

    isBroadcast(): boolean {
        return this.digits == BROADCAST_DIGITS;
    }

    isMulticast(): boolean {
        // I/G bit
        return this.toBinaryRepresentation()[7] == "1";
    }

    isUnicast(): boolean {
        return !this.isMulticast();
    }

    isUaa(): boolean {
        // U/L bit
        return this.isUnicast() && this.toBinaryRepresentation()[6] == "0";
    }

    isLaa(): boolean {
        return this.isUnicast() && this.toBinaryRepresentation()[6] == "1";
    }

    equals(other: MACAddress | string): boolean {
        if (other instanceof MACAddress) {
            return this.digits == other.digits;
        }

        return MACAddress.validate(other) && this.digits == MACAddress.parse(other);
    }

    /** EUI-64 with `ff fe` inserted between the fragments, the U/L bit is left as is */
    toEUI64(): Uint8Array {
        let buffer = this.buffer;
        return uint8_concat([
            buffer.subarray(0, 3),
            new Uint8Array([0xff, 0xfe]),
            buffer.subarray(3),
        ]);
    }
}
