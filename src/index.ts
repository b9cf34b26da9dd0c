export { HufzService, type HufzOptions, type CompressResult, type DecompressResult } from './hufz.js';
export {
    HufzTreeService,
    type FrequencyTable,
    type CodeBook,
    type HuffmanLeaf,
    type HuffmanInternal,
    type HuffmanNode,
    type HuffmanTree
} from './hufz_tree.js';
export { HufzBitService, BitBuffer, type Bit, type PackedBits, type DecodeOutcome } from './hufz_bits.js';
export { HufzContainerService, type CompressedContainer } from './hufz_container.js';
export {
    HufzError,
    EmptyInputError,
    EmptyTreeError,
    MalformedTreeError,
    MissingCodeError,
    InvalidCodeError,
    DecodeTraversalError,
    ContainerFormatError,
    ValidationError
} from './hufz_errors.js';
