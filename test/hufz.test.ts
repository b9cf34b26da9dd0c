/* [FILE: hufz.test.ts] - compress / decompress end to end */
import { suite, test } from 'mocha';
import * as assert from 'assert';
import { HufzService, type HufzOptions } from '../src/hufz.js';
import { HufzContainerService } from '../src/hufz_container.js';
import {
    DecodeTraversalError,
    EmptyInputError,
    MalformedTreeError
} from '../src/hufz_errors.js';

const ascii = (s: string): Uint8Array => Uint8Array.from(s, c => c.charCodeAt(0));

/**
 * Deterministic byte generator (LCG) with a skewed distribution,
 * so that the tree is neither balanced nor linear.
 */
function skewedBytes(length: number, seed: number): Uint8Array {
    const out = new Uint8Array(length);
    let state = seed >>> 0;
    for (let i = 0; i < length; i++) {
        state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
        const r = state / 0x100000000;
        out[i] = Math.floor(r * r * r * 256);
    }
    return out;
}

/**
 * Helper for E2E testing of the Compression -> Decompression cycle.
 */
function assertRoundTrip(title: string, data: Uint8Array, options: HufzOptions = {}): void {
    const compressed = HufzService.compress(data, options);
    assert.ok(HufzService.isCompressed(compressed.output), `[${title}] output must start with the magic header`);

    const restored = HufzService.decompress(compressed.output, options);
    assert.deepStrictEqual(restored.data, data, `[${title}] decompressed bytes differ from the input`);
    assert.strictEqual(restored.originalSize, data.length);
    assert.strictEqual(restored.decompressedSize, data.length);
    assert.strictEqual(restored.compressedSize, compressed.compressedSize);
}

suite('HufzService: round trip', () => {

    test('aaaabbbccd', () => {
        assertRoundTrip('aaaabbbccd', ascii('aaaabbbccd'));
    });

    test('single byte', () => {
        assertRoundTrip('single byte', ascii('x'));
    });

    test('one byte repeated a thousand times', () => {
        assertRoundTrip('repeated', new Uint8Array(1000).fill(7));
    });

    test('every byte value once', () => {
        assertRoundTrip('all distinct', Uint8Array.from({ length: 256 }, (_, i) => i));
    });

    test('every byte value, shuffled and repeated', () => {
        assertRoundTrip('all distinct x3', Uint8Array.from({ length: 768 }, (_, i) => (i * 101) % 256));
    });

    test('mixed-frequency text', () => {
        const text = 'It was a bright cold day in April, and the clocks were striking thirteen.\n'.repeat(20);
        assertRoundTrip('text', ascii(text));
    });

    test('skewed pseudo-random bytes', () => {
        assertRoundTrip('skewed 1', skewedBytes(5000, 1));
        assertRoundTrip('skewed 2', skewedBytes(123, 99));
    });

    test('round-trip validation passes on valid data', () => {
        assertRoundTrip('validated', skewedBytes(2048, 7), { validationLevel: 'roundtrip' });
    });

    test('UTF-8 strings', () => {
        const text = 'Grüße aus Köln, naïve café, 東京タワー 🚀\n'.repeat(5);
        const compressed = HufzService.compress(text);
        assert.strictEqual(compressed.originalSize, Buffer.byteLength(text, 'utf8'));
        assert.strictEqual(HufzService.decompressToString(compressed.output), text);
    });
});

suite('HufzService: container contents', () => {

    test('aaaabbbccd produces a 32-byte container', () => {
        const result = HufzService.compress(ascii('aaaabbbccd'));
        assert.deepStrictEqual(Array.from(result.container.tree), [0x01, 0x00, 0x61, 0x01, 0x00, 0x62, 0x01, 0x00, 0x64, 0x00, 0x63]);
        assert.deepStrictEqual(Array.from(result.container.payload), [0x0a, 0xbf, 0xc0]);
        assert.strictEqual(result.container.padding, 5);
        assert.strictEqual(result.container.symbolCount, 10);
        assert.strictEqual(result.originalSize, 10);
        assert.strictEqual(result.compressedSize, 32);
        assert.strictEqual(result.spaceSaved, -22);
        assert.ok(Math.abs(result.compressionRatio - -220) < 1e-9);
    });

    test('single byte: one payload byte with 7 padding bits', () => {
        const result = HufzService.compress(ascii('x'));
        assert.deepStrictEqual(Array.from(result.container.tree), [0x01, 0x00, 0x78, 0x02]);
        assert.deepStrictEqual(Array.from(result.container.payload), [0x00]);
        assert.strictEqual(result.container.padding, 7);
        assert.strictEqual(result.compressedSize, 23);
        assert.deepStrictEqual(HufzService.decompress(result.output).data, ascii('x'));
    });

    test('one repeated byte costs one bit per symbol', () => {
        const result = HufzService.compress(new Uint8Array(10000).fill(0x41));
        assert.strictEqual(result.container.payload.length, 1250);
        assert.strictEqual(result.container.padding, 0);
        assert.strictEqual(result.compressedSize, 18 + 4 + 1250);
        assert.strictEqual(result.spaceSaved, 10000 - 1272);
        assert.ok(Math.abs(result.compressionRatio - 87.28) < 1e-9);
    });

    test('256 equally frequent bytes get 8-bit codes', () => {
        const result = HufzService.compress(Uint8Array.from({ length: 256 }, (_, i) => i));
        assert.strictEqual(result.container.payload.length, 256);
        assert.strictEqual(result.container.padding, 0);
        // 255 internal tags + 256 (tag, value) pairs
        assert.strictEqual(result.container.tree.length, 767);
    });

    test('output is deterministic', () => {
        const data = skewedBytes(3000, 42);
        assert.deepStrictEqual(HufzService.compress(data).output, HufzService.compress(data).output);
    });

    test('decompress accepts a parsed container', () => {
        const result = HufzService.compress(ascii('aaaabbbccd'));
        const restored = HufzService.decompress(result.container);
        assert.deepStrictEqual(restored.data, ascii('aaaabbbccd'));
        assert.strictEqual(restored.compressedSize, 32);
    });
});

suite('HufzService: errors and warnings', () => {

    test('rejects empty input', () => {
        assert.throws(() => HufzService.compress(new Uint8Array(0)), EmptyInputError);
        assert.throws(() => HufzService.compress(''), EmptyInputError);
    });

    test('reports a corrupt tree', () => {
        const output = HufzService.compress(ascii('aaaabbbccd')).output;
        output[9] = 0x07; // first tree byte
        assert.throws(
            () => HufzService.decompress(output),
            (err: unknown) => err instanceof MalformedTreeError &&
                err.message === 'Unrecognized tag 0x07 (at tree byte 0)'
        );
    });

    test('reports a symbol count larger than the payload holds', () => {
        const output = HufzService.compress(ascii('aaaabbbccd')).output;
        output[24] = 0x0b; // low byte of symbol_count: 10 -> 11
        assert.throws(() => HufzService.decompress(output), DecodeTraversalError);
    });

    test('rejects a huge symbol count from an untrusted container', () => {
        const output = HufzService.compress(ascii('x')).output;
        // symbol_count follows magic, version, tree_length, 4 tree bytes and padding
        output.fill(0xff, 14, 18);
        assert.throws(
            () => HufzService.decompress(output),
            (err: unknown) => err instanceof DecodeTraversalError &&
                err.message === 'Bit stream exhausted: 1 bit(s) cannot hold 4294967295 symbols'
        );
    });

    test('warns about unused payload bits', () => {
        const warnings: string[] = [];
        const restored = HufzService.decompress(
            {
                tree: Uint8Array.of(0x01, 0x00, 0x78, 0x02),
                payload: Uint8Array.of(0x00, 0x00),
                padding: 0,
                symbolCount: 1
            },
            { onWarning: message => warnings.push(message) }
        );
        assert.deepStrictEqual(restored.data, Uint8Array.of(0x78));
        assert.strictEqual(restored.compressedSize, HufzContainerService.overhead(4) + 2);
        assert.deepStrictEqual(warnings, ['[HufzService] Payload has 15 unused bit(s) after 1 symbols']);
    });

    test('no warning for a container produced by compress', () => {
        const warnings: string[] = [];
        HufzService.decompress(HufzService.compress(skewedBytes(999, 3)).output, {
            onWarning: message => warnings.push(message)
        });
        assert.deepStrictEqual(warnings, []);
    });
});
