import { HufzService } from '../src/index.js';

const input = new TextEncoder().encode('aaaabbbccd');

const { output, container, compressionRatio } = HufzService.compress(input);
console.log(`padding=${container.padding} symbols=${container.symbolCount} ratio=${compressionRatio.toFixed(0)}%`);
console.log(Array.from(output, b => b.toString(16).padStart(2, '0')).join(' '));

const { data } = HufzService.decompress(output);
console.log(new TextDecoder().decode(data));

// Output:
// padding=5 symbols=10 ratio=-220%
// 48 55 46 5a 01 00 00 00 0b 01 00 61 01 00 62 01 00 64 00 63 05 00 00 00 0a 00 00 00 03 0a bf c0
// aaaabbbccd
