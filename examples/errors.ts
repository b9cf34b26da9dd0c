import { HufzService } from '../src/hufz.js';
import { HufzError, MalformedTreeError } from '../src/hufz_errors.js';

const { output } = HufzService.compress('hello huffman');
output[9] = 0x07; // corrupt the first tree tag

try {
  HufzService.decompress(output);
} catch (e) {
  if (e instanceof MalformedTreeError) {
    console.log(`${e.name}: ${e.message}`);
  } else if (e instanceof HufzError) {
    console.log(`Other codec failure: ${e.message}`);
  } else {
    throw e;
  }
}

// Output: MalformedTreeError: Unrecognized tag 0x07 (at tree byte 0)
