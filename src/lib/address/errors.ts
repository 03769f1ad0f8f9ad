export class ValidationError extends Error {
    constructor(message: string = "Pass in 12 hexadecimal digits.") {
        super(message);
        this.name = ValidationError.name;
    }
}
