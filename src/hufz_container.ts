/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { ContainerFormatError } from './hufz_errors.js';

/**
 * In-memory form of a compressed buffer.
 */
export type CompressedContainer = {
    /** Tagged pre-order tree, see `HufzTreeService.serialize`. */
    tree: Uint8Array;
    /** Packed code bits. */
    payload: Uint8Array;
    /** Zero bits appended to the last payload byte (0-7). */
    padding: number;
    /** Number of original bytes; decoding stops after this many. */
    symbolCount: number;
};

const U32_MAX = 0xffffffff;

/**
 * Reads and writes the hufz container:
 *
 * ```
 * magic "HUFZ" | version u8 | tree_length u32 | tree
 * | padding u8 | symbol_count u32 | payload_length u32 | payload
 * ```
 * All integers are big-endian.
 */
export class HufzContainerService {

    /** Leading bytes of every container. */
    public static readonly MAGIC = Uint8Array.of(0x48, 0x55, 0x46, 0x5a); // "HUFZ"

    public static readonly VERSION = 1;

    /** Size of every fixed-width field combined. */
    public static readonly HEADER_SIZE = 4 + 1 + 4 + 1 + 4 + 4;

    /**
     * Total framing overhead, i.e. container size minus payload size.
     */
    public static overhead(treeLength: number): number {
        return this.HEADER_SIZE + treeLength;
    }

    /**
     * Checks for the magic header.
     */
    public static isCompressed(bytes: Uint8Array): boolean {
        if (bytes.length < this.MAGIC.length) {
            return false;
        }
        return this.MAGIC.every((b, i) => bytes[i] === b);
    }

    /**
     * @throws {ContainerFormatError} If a field does not fit its width.
     */
    public static write(container: CompressedContainer): Uint8Array {
        const { tree, payload, padding, symbolCount } = container;

        if (!Number.isInteger(padding) || padding < 0 || padding > 7) {
            throw new ContainerFormatError(`Padding must be an integer in 0-7, got ${padding}`);
        }
        if (!Number.isInteger(symbolCount) || symbolCount < 0 || symbolCount > U32_MAX) {
            throw new ContainerFormatError(`Symbol count ${symbolCount} does not fit in 32 bits`);
        }
        if (tree.length > U32_MAX || payload.length > U32_MAX) {
            throw new ContainerFormatError('Tree or payload longer than 4 GiB');
        }

        const out = new Uint8Array(this.overhead(tree.length) + payload.length);
        const view = new DataView(out.buffer);
        let pos = 0;

        out.set(this.MAGIC, pos);
        pos += this.MAGIC.length;
        view.setUint8(pos++, this.VERSION);
        view.setUint32(pos, tree.length);
        pos += 4;
        out.set(tree, pos);
        pos += tree.length;
        view.setUint8(pos++, padding);
        view.setUint32(pos, symbolCount);
        pos += 4;
        view.setUint32(pos, payload.length);
        pos += 4;
        out.set(payload, pos);

        return out;
    }

    /**
     * Parses a container. The returned `tree` and `payload` are views into `bytes`.
     *
     * @throws {ContainerFormatError} On bad magic, unknown version, truncation,
     * padding outside 0-7 or trailing bytes.
     */
    public static read(bytes: Uint8Array): CompressedContainer {
        if (!this.isCompressed(bytes)) {
            throw new ContainerFormatError('Missing HUFZ magic header');
        }

        const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
        let pos = this.MAGIC.length;

        const need = (count: number, field: string): void => {
            if (pos + count > bytes.length) {
                throw new ContainerFormatError(
                    `Container truncated reading ${field}: need ${count} byte(s) at offset ${pos}, have ${bytes.length - pos}`
                );
            }
        };

        need(1, 'version');
        const version = view.getUint8(pos++);
        if (version !== this.VERSION) {
            throw new ContainerFormatError(`Unsupported container version ${version}`);
        }

        need(4, 'tree_length');
        const treeLength = view.getUint32(pos);
        pos += 4;
        need(treeLength, 'tree');
        const tree = bytes.subarray(pos, pos + treeLength);
        pos += treeLength;

        need(1, 'padding');
        const padding = view.getUint8(pos++);
        if (padding > 7) {
            throw new ContainerFormatError(`Padding must be in 0-7, got ${padding}`);
        }

        need(4, 'symbol_count');
        const symbolCount = view.getUint32(pos);
        pos += 4;

        need(4, 'payload_length');
        const payloadLength = view.getUint32(pos);
        pos += 4;
        need(payloadLength, 'payload');
        const payload = bytes.subarray(pos, pos + payloadLength);
        pos += payloadLength;

        if (pos !== bytes.length) {
            throw new ContainerFormatError(`${bytes.length - pos} trailing byte(s) after payload`);
        }

        return { tree, payload, padding, symbolCount };
    }
}
