import superjson from 'superjson';

const MAX_PAYLOAD_SIZE = 1024 * 1024; // 1MB

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

export function serialize(value: unknown): string {
    if (value === undefined) return '';

    let stringified: string;
    try {
        stringified = superjson.stringify(value);
    } catch (err) {
        throw new SerializationError(`Failed to serialize data: ${err instanceof Error ? err.message : String(err)}`);
    }

    const size = Buffer.byteLength(stringified);
    if (size > MAX_PAYLOAD_SIZE) {
        throw new SerializationError(
            `Payload size exceeds maximum limit of 1MB. Current size: ${(size / 1024 / 1024).toFixed(2)}MB`
        );
    }
    return stringified;
}

export function deserialize<T>(value: string | null | undefined): T | undefined {
    if (!value || value.trim() === '') return undefined;

    try {
        return superjson.parse<T>(value);
    } catch (err) {
        throw new SerializationError(`Failed to deserialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

// bytes fields on the gRPC surface
export function toBytes(value: unknown): Buffer {
    return Buffer.from(serialize(value), 'utf-8');
}

export function fromBytes<T>(bytes: Buffer | Uint8Array | null | undefined): T | undefined {
    if (!bytes || bytes.length === 0) return undefined;
    return deserialize<T>(Buffer.from(bytes).toString('utf-8'));
}
