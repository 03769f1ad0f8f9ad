export function uint8_mutateSet(target: Uint8Array, source: Uint8Array, offset: number = 0): Uint8Array {
    let i = 0;
    while (offset < target.byteLength && i < source.byteLength) {
        target[offset++] = source[i++];
    }

    return target;
}

export function uint8_concat(list: readonly Uint8Array[]): Uint8Array {
    let totalLength = list.reduce((sum, { byteLength }) => sum + byteLength, 0);

    let buffer = new Uint8Array(totalLength);

    let i = 0, offset = 0;

    while (i < list.length) {
        uint8_mutateSet(buffer, list[i], offset)
        offset += list[i].byteLength;

        i++;
    }

    return buffer;
}

/**
 * Reads pairs of hex digits into octets, an odd trailing digit is ignored.
 * Callers validate the digits, `NaN` pairs end up as `0`.
 */
export function uint8_fromHex(hex: string): Uint8Array {
    let buffer = new Uint8Array(hex.length >>> 1);

    for (let i = 0; i < buffer.byteLength; i++) {
        buffer[i] = parseInt(hex.substring(i * 2, (i * 2) + 2), 16);
    }

    return buffer;
}

export function uint8_toHex(source: Uint8Array): string {
    let str = "";

    for (let i = 0; i < source.byteLength; i++) {
        str += source[i].toString(16).padStart(2, "0");
    }

    return str;
}

/** Every octet as eight binary digits, most-significant bit first */
export function uint8_toBinary(source: Uint8Array): string {
    let str = "";

    for (let i = 0; i < source.byteLength; i++) {
        str += source[i].toString(2).padStart(8, "0");
    }

    return str;
}
