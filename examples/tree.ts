import { HufzTreeService } from '../src/hufz_tree.js';

const freq = HufzTreeService.buildFrequencyTable(new TextEncoder().encode('aaaabbbccd'));
const tree = HufzTreeService.buildTree(freq);

for (const [byte, code] of HufzTreeService.getCodes(tree)) {
  console.log(`${String.fromCharCode(byte)} (${freq.get(byte)}x) -> ${code}`);
}

// Output:
// a (4x) -> 0
// b (3x) -> 10
// d (1x) -> 110
// c (2x) -> 111
