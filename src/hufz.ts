/**
 * @file hufz.ts
 * @description
 * Main service for compressing and decompressing byte buffers with static
 * Huffman coding. Orchestrates HufzTreeService, HufzBitService and
 * HufzContainerService; performs no I/O itself.
 */

/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */
import { HufzBitService } from './hufz_bits.js';
import { HufzContainerService, type CompressedContainer } from './hufz_container.js';
import { HufzError, ValidationError } from './hufz_errors.js';
import { HufzTreeService } from './hufz_tree.js';

// Used to tree-shake debug logs during minification
const __DEV__ = process.env.NODE_ENV !== 'production';

/**
 * Options for compressing and decompressing.
 */
export type HufzOptions = {
    /** If true, logs each processing step to the console. */
    debug?: boolean;
    /**
     * Checks applied after compressing.
     * - 'none' (default unless debug=true): No validation.
     * - 'roundtrip': Decompresses the produced container and compares it with the input.
     */
    validationLevel?: 'none' | 'roundtrip';
    /**
     * Receives non-fatal notices, such as a payload carrying unused bits.
     * Defaults to `console.warn`.
     */
    onWarning?: (message: string) => void;
};

/**
 * Outcome of `HufzService.compress`, including the numbers a reporting layer needs.
 */
export type CompressResult = {
    container: CompressedContainer;
    /** The serialized container. */
    output: Uint8Array;
    originalSize: number;
    /** Length of `output`, framing included. */
    compressedSize: number;
    /** `(1 - compressedSize / originalSize) * 100`; negative when the output is larger. */
    compressionRatio: number;
    spaceSaved: number;
};

/**
 * Outcome of `HufzService.decompress`.
 */
export type DecompressResult = {
    data: Uint8Array;
    /** Byte count recorded in the container. */
    originalSize: number;
    compressedSize: number;
    decompressedSize: number;
};

export class HufzService {

    /**
     * Compresses a buffer into a self-contained hufz container.
     *
     * Either a complete container is returned or an error is thrown.
     *
     * @param data - Raw bytes, or a string that is compressed as UTF-8.
     * @param options - See `HufzOptions`.
     * @throws {EmptyInputError} If `data` is empty.
     * @throws {ValidationError} If round-trip validation is enabled and fails.
     */
    public static compress(data: Uint8Array | string, options: HufzOptions = {}): CompressResult {
        const debug = options.debug ?? false;
        const validationLevel = options.validationLevel ?? (debug ? 'roundtrip' : 'none');
        const input = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;

        if (__DEV__ && debug) console.log(`[HufzService.compress] Starting (${input.length} bytes)...`);

        const freq = HufzTreeService.buildFrequencyTable(input);
        const tree = HufzTreeService.buildTree(freq, debug);
        const codes = HufzTreeService.getCodes(tree);
        if (__DEV__ && debug) {
            const longest = Math.max(...Array.from(codes.values(), code => code.length));
            console.log(`[HufzService.compress] ${codes.size} distinct bytes, longest code ${longest} bits`);
        }

        const bits = HufzBitService.encode(input, codes, debug);
        const { bytes: payload, padding } = HufzBitService.pack(bits);

        const container: CompressedContainer = {
            tree: HufzTreeService.serialize(tree),
            payload,
            padding,
            symbolCount: input.length
        };
        const output = HufzContainerService.write(container);

        if (validationLevel === 'roundtrip') {
            this.validateRoundTrip(input, output, debug);
        }

        const originalSize = input.length;
        const compressedSize = output.length;
        if (__DEV__ && debug) {
            console.log(`[HufzService.compress] Done: ${originalSize} -> ${compressedSize} bytes (padding ${padding})`);
        }

        return {
            container,
            output,
            originalSize,
            compressedSize,
            compressionRatio: (1 - compressedSize / originalSize) * 100,
            spaceSaved: originalSize - compressedSize
        };
    }

    /**
     * Restores the original bytes from a serialized container or a parsed one.
     *
     * @throws {ContainerFormatError} If the serialized container is malformed.
     * @throws {MalformedTreeError} If the stored tree is corrupt.
     * @throws {DecodeTraversalError} If the payload cannot produce the recorded byte count.
     */
    public static decompress(input: Uint8Array | CompressedContainer, options: HufzOptions = {}): DecompressResult {
        const debug = options.debug ?? false;
        const isSerialized = input instanceof Uint8Array;
        const container = isSerialized ? HufzContainerService.read(input) : input;
        const compressedSize = isSerialized
            ? input.length
            : HufzContainerService.overhead(container.tree.length) + container.payload.length;

        if (__DEV__ && debug) {
            console.log(`[HufzService.decompress] Starting (tree ${container.tree.length} bytes, payload ${container.payload.length} bytes, ${container.symbolCount} symbols)...`);
        }

        const tree = HufzTreeService.deserialize(container.tree);
        const { data, bitsRead, bitsAvailable } = HufzBitService.decodeDetailed(
            container.payload,
            container.padding,
            container.symbolCount,
            tree,
            debug
        );

        if (bitsRead < bitsAvailable) {
            const message = `[HufzService] Payload has ${bitsAvailable - bitsRead} unused bit(s) after ${container.symbolCount} symbols`;
            if (options.onWarning) options.onWarning(message); else console.warn(message);
        }

        return {
            data,
            originalSize: container.symbolCount,
            compressedSize,
            decompressedSize: data.length
        };
    }

    /**
     * Decompresses and decodes the result as UTF-8.
     */
    public static decompressToString(input: Uint8Array | CompressedContainer, options: HufzOptions = {}): string {
        const { data } = this.decompress(input, options);
        return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('utf8');
    }

    /**
     * Checks whether a buffer starts with the hufz magic header.
     */
    public static isCompressed(bytes: Uint8Array): boolean {
        return HufzContainerService.isCompressed(bytes);
    }

    /**
     * Decompresses `output` and compares it byte for byte with `input`.
     */
    private static validateRoundTrip(input: Uint8Array, output: Uint8Array, debug: boolean): void {
        let restored: Uint8Array;
        try {
            restored = this.decompress(output, { debug: false }).data;
        } catch (e) {
            if (e instanceof HufzError) {
                throw new ValidationError(`Round-trip validation failed: ${e.message}`);
            }
            throw e;
        }

        if (restored.length !== input.length) {
            throw new ValidationError(
                `Round-trip validation failed: restored ${restored.length} bytes, expected ${input.length}`
            );
        }
        for (let i = 0; i < input.length; i++) {
            if (restored[i] !== input[i]) {
                if (__DEV__ && debug) {
                    console.error(`--- ROUND-TRIP MISMATCH ---`);
                    console.error(`Index: ${i}, expected 0x${input[i].toString(16)}, got 0x${restored[i].toString(16)}`);
                }
                throw new ValidationError(`Round-trip validation failed: first difference at byte ${i}`);
            }
        }

        if (__DEV__ && debug) console.log('[HufzService.compress] Round-trip validation passed.');
    }
}
