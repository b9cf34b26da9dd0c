// benchmarks/index.ts
import { performance } from 'perf_hooks';
import * as fs from 'fs';
import * as path from 'path';
import * as zlib from 'zlib';
import { fileURLToPath } from 'url';
import { HufzService } from '../src/hufz.js';

// ESM-compatible equivalent for __dirname
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

interface BenchmarkResult {
    name: string;
    compressedSize: number;
    compressTime: number;
    decompressTime: number;
    correctness: '✅ OK' | '❌ FAILED';
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
    return a.length === b.length && a.every((v, i) => v === b[i]);
}

// --- hufz ---
function runHufz(input: Uint8Array): BenchmarkResult {
    let compressedSize = 0;
    let compressTime = 0;
    let decompressTime = 0;
    let isCorrect = false;

    try {
        const startCompress = performance.now();
        const { output } = HufzService.compress(input);
        compressTime = performance.now() - startCompress;
        compressedSize = output.length;

        const startDecompress = performance.now();
        const { data } = HufzService.decompress(output);
        decompressTime = performance.now() - startDecompress;
        isCorrect = sameBytes(data, input);
    } catch (e) {
        console.error('\n[hufz] BENCHMARK FAILED:', e);
    }

    return {
        name: 'hufz (static Huffman)',
        compressedSize,
        compressTime,
        decompressTime,
        correctness: isCorrect ? '✅ OK' : '❌ FAILED',
    };
}

// --- zlib, raw deflate ---
function runDeflate(input: Uint8Array, name: string, options: zlib.ZlibOptions): BenchmarkResult {
    const startCompress = performance.now();
    const compressed = zlib.deflateRawSync(input, options);
    const compressTime = performance.now() - startCompress;

    const startDecompress = performance.now();
    const restored = zlib.inflateRawSync(compressed);
    const decompressTime = performance.now() - startDecompress;

    return {
        name,
        compressedSize: compressed.length,
        compressTime,
        decompressTime,
        correctness: sameBytes(restored, input) ? '✅ OK' : '❌ FAILED',
    };
}

// --- Data Generation ---
function loadSources(): Uint8Array {
    const srcDir = path.join(__dirname, '..', 'src');
    const files = fs.readdirSync(srcDir).filter(f => f.endsWith('.ts')).sort();
    return Buffer.concat(files.map(f => fs.readFileSync(path.join(srcDir, f))));
}

function generateLowEntropyContent(size: number): Uint8Array {
    const out = new Uint8Array(size);
    for (let i = 0; i < size; i++) {
        out[i] = i % 97 === 0 ? 0x42 : 0x41;
    }
    return out;
}

function generateRandomBytes(size: number, seed: number): Uint8Array {
    const out = new Uint8Array(size);
    let state = seed >>> 0;
    for (let i = 0; i < size; i++) {
        state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
        out[i] = state >>> 24;
    }
    return out;
}

// --- Benchmark Runner ---
function runBenchmark(scenarioName: string, input: Uint8Array) {
    console.log(`\n=== ${scenarioName} (${input.length.toLocaleString()} bytes) ===`);
    const results = [
        runHufz(input),
        runDeflate(input, 'zlib (Huffman only)', { strategy: zlib.constants.Z_HUFFMAN_ONLY }),
        runDeflate(input, 'zlib (default)', {}),
    ];

    const bestSize = Math.min(...results.map(r => r.compressedSize).filter(s => s > 0));

    console.table(results.map(r => {
        const sizeTag = r.compressedSize === bestSize ? ' 🥇' : '';
        return {
            'Library': r.name + sizeTag,
            'Size (B)': r.compressedSize,
            'Ratio (%)': ((1 - r.compressedSize / input.length) * 100).toFixed(2),
            'Compress (ms)': r.compressTime.toFixed(2),
            'Decompress (ms)': r.decompressTime.toFixed(2),
            'Correctness': r.correctness,
        };
    }));
}

// --- Main Execution ---
function main() {
    try {
        runBenchmark('Source code (src/*.ts)', loadSources());
    } catch (e) {
        console.warn('Skipping source code benchmark:', e instanceof Error ? e.message : e);
    }

    runBenchmark('Low Entropy (Repeating Data)', generateLowEntropyContent(1_000_000));
    runBenchmark('Random Bytes (Incompressible)', generateRandomBytes(256 * 1024, 12345));
    runBenchmark('Single Byte Value', new Uint8Array(100_000).fill(0x20));
}

main();
