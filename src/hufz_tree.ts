/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import {
    EmptyInputError,
    EmptyTreeError,
    MalformedTreeError
} from './hufz_errors.js';

// Used to tree-shake debug logs during minification
const __DEV__ = process.env.NODE_ENV !== 'production';

/**
 * Byte value -> number of occurrences. Only bytes present in the input are keys.
 */
export type FrequencyTable = Map<number, number>;

/**
 * Byte value -> code as a string of '0' / '1' characters.
 */
export type CodeBook = Map<number, string>;

export type HuffmanLeaf = {
    readonly kind: 'leaf';
    readonly value: number;
    readonly weight: number;
};

export type HuffmanInternal = {
    readonly kind: 'internal';
    readonly weight: number;
    readonly left: HuffmanNode;
    /**
     * `null` only when the tree holds a single symbol: the root then has
     * one leaf on its left, so that the symbol still gets the 1-bit code "0".
     */
    readonly right: HuffmanNode | null;
};

export type HuffmanNode = HuffmanLeaf | HuffmanInternal;

/**
 * A Huffman tree is always rooted at an internal node.
 */
export type HuffmanTree = HuffmanInternal;

/**
 * @internal
 * Tag bytes of the pre-order tree encoding.
 */
const TAG_LEAF = 0x00;
const TAG_INTERNAL = 0x01;
const TAG_EMPTY = 0x02;

type QueueEntry = {
    node: HuffmanNode;
    seq: number;
};

/**
 * @internal
 * Binary min-heap of tree nodes ordered by weight, then by insertion sequence,
 * so equal weights come out first-in first-out.
 */
class HuffmanQueue {
    private readonly heap: QueueEntry[] = [];
    private seqCounter = 0;

    public get size(): number {
        return this.heap.length;
    }

    public push(node: HuffmanNode): void {
        this.heap.push({ node, seq: this.seqCounter++ });
        let i = this.heap.length - 1;
        while (i > 0) {
            const parent = (i - 1) >> 1;
            if (!HuffmanQueue.before(this.heap[i], this.heap[parent])) break;
            this.swap(i, parent);
            i = parent;
        }
    }

    public pop(): HuffmanNode | undefined {
        const top = this.heap[0];
        const last = this.heap.pop();
        if (top === undefined || last === undefined) return undefined;
        if (this.heap.length > 0) {
            this.heap[0] = last;
            this.siftDown(0);
        }
        return top.node;
    }

    private siftDown(start: number): void {
        const n = this.heap.length;
        let i = start;
        for (;;) {
            const left = 2 * i + 1;
            const right = left + 1;
            let smallest = i;
            if (left < n && HuffmanQueue.before(this.heap[left], this.heap[smallest])) smallest = left;
            if (right < n && HuffmanQueue.before(this.heap[right], this.heap[smallest])) smallest = right;
            if (smallest === i) return;
            this.swap(i, smallest);
            i = smallest;
        }
    }

    private swap(a: number, b: number): void {
        const tmp = this.heap[a];
        this.heap[a] = this.heap[b];
        this.heap[b] = tmp;
    }

    private static before(a: QueueEntry, b: QueueEntry): boolean {
        if (a.node.weight !== b.node.weight) return a.node.weight < b.node.weight;
        return a.seq < b.seq;
    }
}

/**
 * Builds Huffman trees from byte frequencies, derives code books from them and
 * converts trees to and from their stored form.
 *
 * Every traversal uses an explicit stack: Fibonacci-like frequencies over 256
 * symbols produce a tree that is 255 levels deep.
 */
export class HufzTreeService {

    /**
     * Counts the occurrences of each byte value in one pass.
     *
     * @param data - The input bytes. Must not be empty.
     * @returns A table whose keys are in ascending byte order.
     * @throws {EmptyInputError} If `data` is empty.
     */
    public static buildFrequencyTable(data: Uint8Array): FrequencyTable {
        if (data.length === 0) {
            throw new EmptyInputError();
        }

        const counts = new Float64Array(256);
        for (let i = 0; i < data.length; i++) {
            counts[data[i]]++;
        }

        const table: FrequencyTable = new Map();
        for (let byte = 0; byte < 256; byte++) {
            if (counts[byte] > 0) table.set(byte, counts[byte]);
        }
        return table;
    }

    /**
     * Greedy merge of the two lightest nodes until one root remains.
     * The first node taken off the queue becomes the left child.
     *
     * @param freq - Leaves are inserted in the table's iteration order.
     * @param debug - Flag for verbose logging.
     * @throws {EmptyInputError} If the table has no entries.
     */
    public static buildTree(freq: FrequencyTable, debug: boolean = false): HuffmanTree {
        const queue = new HuffmanQueue();
        for (const [value, weight] of freq) {
            queue.push({ kind: 'leaf', value, weight });
        }

        if (queue.size === 0) {
            throw new EmptyInputError('Cannot build a Huffman tree from an empty frequency table');
        }

        if (queue.size === 1) {
            const only = queue.pop();
            if (only === undefined) throw new EmptyInputError();
            if (__DEV__ && debug) console.log(`[HufzTreeService.buildTree] Single symbol, wrapping leaf in a root`);
            return { kind: 'internal', weight: only.weight, left: only, right: null };
        }

        for (;;) {
            const left = queue.pop();
            const right = queue.pop();
            if (left === undefined || right === undefined) {
                throw new EmptyTreeError('Priority queue drained before a root was formed');
            }
            const parent: HuffmanInternal = {
                kind: 'internal',
                weight: left.weight + right.weight,
                left,
                right
            };
            if (queue.size === 0) {
                if (__DEV__ && debug) console.log(`[HufzTreeService.buildTree] Built tree over ${freq.size} symbols, weight ${parent.weight}`);
                return parent;
            }
            queue.push(parent);
        }
    }

    /**
     * Derives the code book by walking from the root: '0' on the left
     * branch, '1' on the right, recording a code at every leaf.
     *
     * @throws {EmptyTreeError} If `tree` is absent.
     */
    public static getCodes(tree: HuffmanTree | null | undefined): CodeBook {
        if (tree == null) {
            throw new EmptyTreeError();
        }

        const codes: CodeBook = new Map();
        const stack: Array<{ node: HuffmanNode; code: string }> = [{ node: tree, code: '' }];

        while (stack.length > 0) {
            const item = stack.pop();
            if (item === undefined) break;
            const { node, code } = item;

            if (node.kind === 'leaf') {
                codes.set(node.value, code);
                continue;
            }
            // Right first so the left subtree is visited first
            if (node.right !== null) stack.push({ node: node.right, code: code + '1' });
            stack.push({ node: node.left, code: code + '0' });
        }

        return codes;
    }

    /**
     * Code length of every symbol, i.e. the depth of its leaf.
     */
    public static getDepths(tree: HuffmanTree | null | undefined): Map<number, number> {
        const depths = new Map<number, number>();
        for (const [value, code] of this.getCodes(tree)) {
            depths.set(value, code.length);
        }
        return depths;
    }

    /**
     * Flattens a tree into its tagged pre-order form:
     * - `0x01` internal node, followed by its left then right subtree
     * - `0x00` leaf, followed by the byte value
     * - `0x02` absent right child of a single-symbol root
     *
     * @throws {EmptyTreeError} If `tree` is absent.
     */
    public static serialize(tree: HuffmanTree | null | undefined): Uint8Array {
        if (tree == null) {
            throw new EmptyTreeError();
        }

        const out: number[] = [];
        const stack: Array<HuffmanNode | null> = [tree];

        while (stack.length > 0) {
            const node = stack.pop();
            if (node === undefined) break;

            if (node === null) {
                out.push(TAG_EMPTY);
            } else if (node.kind === 'leaf') {
                out.push(TAG_LEAF, node.value);
            } else {
                if (node.right === null && (node !== tree || node.left.kind !== 'leaf')) {
                    throw new MalformedTreeError('Only a single-symbol root may have an empty right child', out.length);
                }
                out.push(TAG_INTERNAL);
                stack.push(node.right, node.left);
            }
        }

        return Uint8Array.from(out);
    }

    /**
     * Rebuilds a tree from its tagged pre-order form.
     * Stored trees carry no weights; every rebuilt node has weight 0.
     *
     * @throws {MalformedTreeError} On truncation, an unknown tag, a leaf
     * root, a misplaced empty tag or bytes left over after the root.
     */
    public static deserialize(bytes: Uint8Array): HuffmanTree {
        // Internal nodes whose children are still being parsed
        const pending: Array<{ left: HuffmanNode | undefined }> = [];
        let pos = 0;

        for (;;) {
            if (pos >= bytes.length) {
                throw new MalformedTreeError('Serialized tree is truncated', pos);
            }
            const tagOffset = pos;
            const tag = bytes[pos++];
            let completed: HuffmanNode | null;

            switch (tag) {
                case TAG_INTERNAL:
                    pending.push({ left: undefined });
                    continue;

                case TAG_LEAF: {
                    if (pending.length === 0) {
                        throw new MalformedTreeError('Tree root must be an internal node', tagOffset);
                    }
                    if (pos >= bytes.length) {
                        throw new MalformedTreeError('Leaf is missing its byte value', pos);
                    }
                    completed = { kind: 'leaf', value: bytes[pos++], weight: 0 };
                    break;
                }

                case TAG_EMPTY: {
                    const root = pending[0];
                    if (pending.length !== 1 || root.left === undefined || root.left.kind !== 'leaf') {
                        throw new MalformedTreeError('Empty child is only valid as the right child of a single-symbol root', tagOffset);
                    }
                    completed = null;
                    break;
                }

                default:
                    throw new MalformedTreeError(`Unrecognized tag 0x${tag.toString(16).padStart(2, '0')}`, tagOffset);
            }

            // Attach the finished subtree, closing every parent it completes
            let node: HuffmanNode | null = completed;
            for (;;) {
                const frame = pending[pending.length - 1];
                if (frame.left === undefined) {
                    if (node === null) {
                        throw new MalformedTreeError('Left child cannot be empty', tagOffset);
                    }
                    frame.left = node;
                    break;
                }

                pending.pop();
                const internal: HuffmanInternal = { kind: 'internal', weight: 0, left: frame.left, right: node };
                if (pending.length === 0) {
                    if (pos !== bytes.length) {
                        throw new MalformedTreeError(`${bytes.length - pos} trailing byte(s) after tree root`, pos);
                    }
                    return internal;
                }
                node = internal;
            }
        }
    }

    /**
     * Compares two trees by shape and leaf values, ignoring weights.
     */
    public static isSameShape(a: HuffmanTree, b: HuffmanTree): boolean {
        const stack: Array<[HuffmanNode | null, HuffmanNode | null]> = [[a, b]];

        while (stack.length > 0) {
            const pair = stack.pop();
            if (pair === undefined) break;
            const [x, y] = pair;

            if (x === null || y === null) {
                if (x !== y) return false;
                continue;
            }
            if (x.kind === 'leaf' || y.kind === 'leaf') {
                if (x.kind !== 'leaf' || y.kind !== 'leaf' || x.value !== y.value) return false;
                continue;
            }
            stack.push([x.left, y.left], [x.right, y.right]);
        }

        return true;
    }
}
