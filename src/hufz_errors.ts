/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * Base class for every failure raised by hufz.
 * Lets callers catch all codec errors with a single `instanceof` check.
 */
export class HufzError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Raised when asked to compress a zero-length input. */
export class EmptyInputError extends HufzError {
    constructor(message: string = 'Cannot compress an empty input') {
        super(message);
    }
}

/** Raised when an operation receives an absent tree. */
export class EmptyTreeError extends HufzError {
    constructor(message: string = 'Huffman tree is empty') {
        super(message);
    }
}

/** Raised when a serialized tree is truncated or structurally invalid. */
export class MalformedTreeError extends HufzError {
    /** Byte offset in the serialized tree where parsing stopped. */
    public readonly offset: number;

    constructor(message: string, offset: number) {
        super(`${message} (at tree byte ${offset})`);
        this.offset = offset;
    }
}

/** Raised when a byte has no entry in the code book. */
export class MissingCodeError extends HufzError {
    public readonly byte: number;

    constructor(byte: number, index: number) {
        super(`No code assigned to byte 0x${byte.toString(16).padStart(2, '0')} at input index ${index}`);
        this.byte = byte;
    }
}

/** Raised when a code book entry is not a non-empty string of '0' / '1'. */
export class InvalidCodeError extends HufzError {
    public readonly byte: number;

    constructor(byte: number, code: string) {
        super(`Code for byte ${byte} must be a non-empty string of 0/1, got "${code}"`);
        this.byte = byte;
    }
}

/** Raised when the bit stream cannot be walked back into the expected symbols. */
export class DecodeTraversalError extends HufzError {}

/** Raised when a container has a bad header, bad field values or wrong length. */
export class ContainerFormatError extends HufzError {}

/** Raised by round-trip validation when the decompressed bytes differ from the input. */
export class ValidationError extends HufzError {}
