/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import {
    DecodeTraversalError,
    EmptyTreeError,
    InvalidCodeError,
    MissingCodeError
} from './hufz_errors.js';
import type { CodeBook, HuffmanInternal, HuffmanTree } from './hufz_tree.js';

// Used to tree-shake debug logs during minification
const __DEV__ = process.env.NODE_ENV !== 'production';

export type Bit = 0 | 1;

/**
 * Bits grouped into whole bytes, most significant bit first.
 */
export type PackedBits = {
    bytes: Uint8Array;
    /** Number of zero bits appended to fill the last byte (0-7). */
    padding: number;
};

/**
 * Result of walking a packed bit stream back into symbols.
 */
export type DecodeOutcome = {
    data: Uint8Array;
    /** Bits consumed to produce `data`. */
    bitsRead: number;
    /** Bits available after padding was dropped. */
    bitsAvailable: number;
};

/**
 * Growable sequence of bits, stored packed MSB-first.
 * Storage past `length` is always zero, so packing is a plain copy.
 */
export class BitBuffer {
    private storage: Uint8Array;
    private bitLength = 0;

    constructor(initialCapacityBits: number = 64) {
        this.storage = new Uint8Array(Math.max(1, Math.ceil(initialCapacityBits / 8)));
    }

    /**
     * Wraps the first `bitLength` bits of `bytes` (copied).
     */
    public static fromBytes(bytes: Uint8Array, bitLength: number): BitBuffer {
        const buffer = new BitBuffer(bitLength);
        const fullBytes = bitLength >> 3;
        buffer.storage.set(bytes.subarray(0, fullBytes));
        const rest = bitLength & 7;
        if (rest > 0) {
            // Keep only the leading `rest` bits of the partial byte
            buffer.storage[fullBytes] = bytes[fullBytes] & (0xff << (8 - rest));
        }
        buffer.bitLength = bitLength;
        return buffer;
    }

    public get length(): number {
        return this.bitLength;
    }

    public push(bit: Bit): void {
        const byteIndex = this.bitLength >> 3;
        if (byteIndex >= this.storage.length) {
            const grown = new Uint8Array(this.storage.length * 2);
            grown.set(this.storage);
            this.storage = grown;
        }
        if (bit === 1) {
            this.storage[byteIndex] |= 0x80 >> (this.bitLength & 7);
        }
        this.bitLength++;
    }

    /**
     * Appends a code given as a string of '0' / '1' characters.
     */
    public pushCode(code: string): void {
        for (let i = 0; i < code.length; i++) {
            this.push(code.charCodeAt(i) === 49 ? 1 : 0);
        }
    }

    public get(index: number): Bit {
        if (index < 0 || index >= this.bitLength) {
            throw new RangeError(`Bit index ${index} out of range [0, ${this.bitLength})`);
        }
        return ((this.storage[index >> 3] >> (7 - (index & 7))) & 1) === 1 ? 1 : 0;
    }

    /**
     * Copies the bits into whole bytes.
     */
    public toBytes(): Uint8Array {
        return this.storage.slice(0, Math.ceil(this.bitLength / 8));
    }

    public toString(): string {
        let out = '';
        for (let i = 0; i < this.bitLength; i++) {
            out += this.get(i) === 1 ? '1' : '0';
        }
        return out;
    }
}

/**
 * Turns bytes into Huffman-coded bits and back.
 */
export class HufzBitService {

    /**
     * Appends the code of every input byte, in order.
     *
     * @param data - Bytes to encode.
     * @param codes - Code book covering every byte in `data`.
     * @param debug - Flag for verbose logging.
     * @returns The concatenated code bits.
     * @throws {InvalidCodeError} If a code is not a non-empty string of 0/1.
     * @throws {MissingCodeError} If a byte has no code.
     */
    public static encode(data: Uint8Array, codes: CodeBook, debug: boolean = false): BitBuffer {
        // Validate each code once instead of once per occurrence
        for (const [byte, code] of codes) {
            if (code.length === 0 || !/^[01]+$/.test(code)) {
                throw new InvalidCodeError(byte, code);
            }
        }

        const bits = new BitBuffer(data.length * 2);
        for (let i = 0; i < data.length; i++) {
            const code = codes.get(data[i]);
            if (code === undefined) {
                throw new MissingCodeError(data[i], i);
            }
            bits.pushCode(code);
        }

        if (__DEV__ && debug) console.log(`[HufzBitService.encode] ${data.length} bytes -> ${bits.length} bits`);
        return bits;
    }

    /**
     * Groups bits into bytes left to right, zero-filling the last byte.
     */
    public static pack(bits: BitBuffer): PackedBits {
        return {
            bytes: bits.toBytes(),
            padding: (8 - (bits.length % 8)) % 8
        };
    }

    /**
     * Inverse of `pack`: expands bytes to bits and drops `padding` trailing bits.
     *
     * @throws {DecodeTraversalError} If `padding` is not in 0-7 or exceeds the available bits.
     */
    public static unpack(bytes: Uint8Array, padding: number): BitBuffer {
        if (!Number.isInteger(padding) || padding < 0 || padding > 7) {
            throw new DecodeTraversalError(`Padding must be an integer in 0-7, got ${padding}`);
        }
        const bitLength = bytes.length * 8 - padding;
        if (bitLength < 0) {
            throw new DecodeTraversalError(`Padding of ${padding} bits exceeds an empty payload`);
        }
        return BitBuffer.fromBytes(bytes, bitLength);
    }

    /**
     * Walks the tree once per bit (left on 0, right on 1), emitting a byte and
     * restarting at the root at every leaf. Stops after exactly `symbolCount`
     * bytes, whatever bits remain.
     *
     * @throws {EmptyTreeError} If `tree` is absent.
     * @throws {DecodeTraversalError} If the bits run out first, or a bit leads to an absent child.
     */
    public static decode(
        bytes: Uint8Array,
        padding: number,
        symbolCount: number,
        tree: HuffmanTree | null | undefined,
        debug: boolean = false
    ): Uint8Array {
        return this.decodeDetailed(bytes, padding, symbolCount, tree, debug).data;
    }

    /**
     * Same as `decode`, also reporting how many bits were consumed.
     */
    public static decodeDetailed(
        bytes: Uint8Array,
        padding: number,
        symbolCount: number,
        tree: HuffmanTree | null | undefined,
        debug: boolean = false
    ): DecodeOutcome {
        if (tree == null) {
            throw new EmptyTreeError();
        }
        if (!Number.isSafeInteger(symbolCount) || symbolCount < 0) {
            throw new DecodeTraversalError(`Symbol count must be a non-negative integer, got ${symbolCount}`);
        }

        const bits = this.unpack(bytes, padding);
        // Every leaf is at depth >= 1, so each symbol costs at least one bit
        if (symbolCount > bits.length) {
            throw new DecodeTraversalError(
                `Bit stream exhausted: ${bits.length} bit(s) cannot hold ${symbolCount} symbols`
            );
        }
        const out = new Uint8Array(symbolCount);
        let produced = 0;
        let bitIndex = 0;
        let node: HuffmanInternal = tree;

        while (produced < symbolCount) {
            if (bitIndex >= bits.length) {
                throw new DecodeTraversalError(
                    `Bit stream exhausted after ${produced} of ${symbolCount} symbols`
                );
            }
            const next = bits.get(bitIndex) === 0 ? node.left : node.right;
            if (next === null) {
                throw new DecodeTraversalError(`Bit ${bitIndex} leads to an absent child`);
            }
            bitIndex++;

            if (next.kind === 'leaf') {
                out[produced++] = next.value;
                node = tree;
            } else {
                node = next;
            }
        }

        if (__DEV__ && debug) {
            console.log(`[HufzBitService.decode] ${bitIndex} of ${bits.length} bits -> ${produced} bytes`);
        }

        return { data: out, bitsRead: bitIndex, bitsAvailable: bits.length };
    }
}
