// tools/compare.ts - Compress a file in memory and report the sizes
import { readFileSync } from 'node:fs';
import { HufzService } from '../src/hufz.js';

const filePath = process.argv[2];
if (!filePath) {
    console.error('Usage: tsx tools/compare.ts <file>');
    process.exit(1);
}

const input = readFileSync(filePath);
const result = HufzService.compress(input, { validationLevel: 'roundtrip' });

console.log(`Original size:   ${result.originalSize.toLocaleString()} bytes`);
console.log(`Compressed size: ${result.compressedSize.toLocaleString()} bytes`);
console.log(`Space saved:     ${result.spaceSaved.toLocaleString()} bytes`);
console.log(`Compression ratio: ${result.compressionRatio.toFixed(2)}% smaller`);
