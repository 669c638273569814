import { vi } from 'vitest';
import type { TextUnmarshaler } from '../src/structure/descriptor';
import type { Logger } from '../src/types';

/**
 * Hex-encoded byte string, decoding itself from text.
 */
export class HexEncoded implements TextUnmarshaler {
    bytes: number[] = [];

    unmarshalText(text: Uint8Array): void {
        const hex = new TextDecoder().decode(text);
        if (!/^(?:[0-9a-f]{2})*$/i.test(hex)) {
            throw new Error('invalid hex string');
        }
        this.bytes = (hex.match(/../g) ?? []).map((pair) => parseInt(pair, 16));
    }
}

export const createMockLogger = (): Logger => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    verbose: vi.fn(),
    silly: vi.fn(),
});
