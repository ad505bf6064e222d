export class RandomError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RandomError';
    }
}

export class ArgumentOutOfRangeError extends RandomError {
    constructor(
        public readonly paramName: string,
        public readonly actualValue: number | bigint,
        message: string,
    ) {
        super(`${paramName}: ${message} (actual: ${String(actualValue)})`);
        this.name = 'ArgumentOutOfRangeError';
    }
}
