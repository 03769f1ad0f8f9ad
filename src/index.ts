export { BaseAddress } from "./lib/address/base";
export { ValidationError } from "./lib/address/errors";
export { MACAddress, EXTENDED_IDENTIFIER_KINDS } from "./lib/address/mac/mac";
export type { ExtendedIdentifierKind } from "./lib/address/mac/mac";
export {
    MAC_NOTATIONS,
    cleanNotation,
    detectNotation,
    formatNotation,
    isValidNotation,
    parseNotation,
} from "./lib/address/mac/notation";
export type { MACNotation } from "./lib/address/mac/notation";
