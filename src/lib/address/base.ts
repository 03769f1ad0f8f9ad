export abstract class BaseAddress {
    static ADDRESS_LENGTH = 0;

    abstract get buffer(): Uint8Array;

    abstract toString(): string;

    toJSON(): { type: string; address: string } {
        return {
            type: this.constructor.name,
            address: this.toString(),
        }
    }
}
