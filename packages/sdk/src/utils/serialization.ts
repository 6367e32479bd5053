import superjson from 'superjson';

export const MAX_PAYLOAD_BYTES = 1024 * 1024; // 1MB

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

/**
 * Encodes a step payload so that Dates, Maps and Sets survive a round trip
 * through the history store. `undefined` encodes to the empty string.
 */
export function serialize(value: unknown, maxBytes: number = MAX_PAYLOAD_BYTES): string {
    if (value === undefined) return '';

    let stringified: string;
    try {
        stringified = superjson.stringify(value);
    } catch (err) {
        throw new SerializationError(`Failed to serialize payload: ${err instanceof Error ? err.message : String(err)}`);
    }

    const size = Buffer.byteLength(stringified);
    if (size > maxBytes) {
        throw new SerializationError(
            `Payload of ${size} bytes exceeds the ${maxBytes} byte limit`
        );
    }
    return stringified;
}

export function deserialize(value: string | null | undefined): unknown {
    if (!value || value.trim() === '') return undefined;

    try {
        return superjson.parse<unknown>(value);
    } catch (err) {
        throw new SerializationError(`Failed to deserialize payload: ${err instanceof Error ? err.message : String(err)}`);
    }
}

export function toBuffer(value: unknown): Buffer {
    return Buffer.from(serialize(value), 'utf-8');
}
