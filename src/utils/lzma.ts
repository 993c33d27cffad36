/**
 * LZMA decoder for payloads stored as a 5-byte properties header followed by
 * the range-coded stream, with the output size known from the index.
 */

const PROPERTIES_SIZE = 5;

const NUM_POS_BITS_MAX = 4;
const NUM_POS_STATES_MAX = 1 << NUM_POS_BITS_MAX;
const LEN_NUM_LOW_BITS = 3;
const LEN_NUM_LOW_SYMBOLS = 1 << LEN_NUM_LOW_BITS;
const LEN_NUM_HIGH_BITS = 8;
const LEN_NUM_HIGH_SYMBOLS = 1 << LEN_NUM_HIGH_BITS;
const NUM_STATES = 12;
const NUM_LIT_STATES = 7;
const END_POS_MODEL_INDEX = 14;
const NUM_FULL_DISTANCES = 1 << (END_POS_MODEL_INDEX >> 1);
const NUM_POS_SLOT_BITS = 6;
const NUM_LEN_TO_POS_STATES = 4;
const NUM_ALIGN_BITS = 4;
const MATCH_MIN_LEN = 2;

export class LzmaDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LzmaDataError';
  }
}

class RangeDecoder {
  private range = 0xffffffff;
  private code = 0;
  private pos: number;

  constructor(private readonly input: Uint8Array, start: number) {
    this.pos = start;
    if (this.readByte() !== 0) {
      throw new LzmaDataError('LZMA stream does not start with a zero byte');
    }
    for (let i = 0; i < 4; i += 1) {
      this.code = ((this.code << 8) | this.readByte()) >>> 0;
    }
  }

  decodeBit(probs: Uint16Array, index: number): number {
    const prob = probs[index];
    const bound = ((this.range >>> 11) * prob) >>> 0;
    if (this.code < bound) {
      this.range = bound;
      probs[index] = prob + ((2048 - prob) >>> 5);
      this.normalize();
      return 0;
    }
    this.range = (this.range - bound) >>> 0;
    this.code = (this.code - bound) >>> 0;
    probs[index] = prob - (prob >>> 5);
    this.normalize();
    return 1;
  }

  decodeDirectBits(numBits: number): number {
    let result = 0;
    for (let i = 0; i < numBits; i += 1) {
      this.range >>>= 1;
      let bit = 0;
      if (this.code >= this.range) {
        this.code = (this.code - this.range) >>> 0;
        bit = 1;
      }
      result = ((result << 1) | bit) >>> 0;
      this.normalize();
    }
    return result;
  }

  private normalize(): void {
    if (this.range < 0x01000000) {
      this.range = (this.range << 8) >>> 0;
      this.code = ((this.code << 8) | this.readByte()) >>> 0;
    }
  }

  private readByte(): number {
    if (this.pos >= this.input.length) {
      throw new LzmaDataError('Truncated LZMA stream');
    }
    return this.input[this.pos++];
  }
}

/** Output buffer doubling as the sliding dictionary. */
class OutputWindow {
  written = 0;
  readonly buffer: Buffer;

  constructor(size: number) {
    this.buffer = Buffer.alloc(size);
  }

  get full(): boolean {
    return this.written >= this.buffer.length;
  }

  prevByte(): number {
    return this.written === 0 ? 0 : this.buffer[this.written - 1];
  }

  byteAt(distance: number): number {
    if (distance <= 0 || distance > this.written) {
      throw new LzmaDataError(`LZMA distance ${distance} exceeds decoded length ${this.written}`);
    }
    return this.buffer[this.written - distance];
  }

  put(value: number): void {
    if (this.full) {
      throw new LzmaDataError('LZMA output exceeds expected size');
    }
    this.buffer[this.written++] = value;
  }

  copyMatch(distance: number, length: number): void {
    if (distance <= 0 || distance > this.written) {
      throw new LzmaDataError(`LZMA distance ${distance} exceeds decoded length ${this.written}`);
    }
    if (this.written + length > this.buffer.length) {
      throw new LzmaDataError('LZMA output exceeds expected size');
    }
    for (let i = 0; i < length; i += 1) {
      this.buffer[this.written] = this.buffer[this.written - distance];
      this.written += 1;
    }
  }
}

class LenDecoder {
  private readonly choice = new Uint16Array(2).fill(1024);
  private readonly low = new Uint16Array(NUM_POS_STATES_MAX << LEN_NUM_LOW_BITS).fill(1024);
  private readonly mid = new Uint16Array(NUM_POS_STATES_MAX << LEN_NUM_LOW_BITS).fill(1024);
  private readonly high = new Uint16Array(LEN_NUM_HIGH_SYMBOLS).fill(1024);

  decode(range: RangeDecoder, posState: number): number {
    if (range.decodeBit(this.choice, 0) === 0) {
      return decodeBitTree(range, this.low, posState << LEN_NUM_LOW_BITS, LEN_NUM_LOW_BITS);
    }
    if (range.decodeBit(this.choice, 1) === 0) {
      return LEN_NUM_LOW_SYMBOLS + decodeBitTree(range, this.mid, posState << LEN_NUM_LOW_BITS, LEN_NUM_LOW_BITS);
    }
    return LEN_NUM_LOW_SYMBOLS * 2 + decodeBitTree(range, this.high, 0, LEN_NUM_HIGH_BITS);
  }
}

function decodeBitTree(range: RangeDecoder, probs: Uint16Array, offset: number, bits: number): number {
  let symbol = 1;
  for (let i = 0; i < bits; i += 1) {
    symbol = (symbol << 1) | range.decodeBit(probs, offset + symbol);
  }
  return symbol - (1 << bits);
}

function decodeReverseBitTree(range: RangeDecoder, probs: Uint16Array, offset: number, bits: number): number {
  let symbol = 1;
  let result = 0;
  for (let i = 0; i < bits; i += 1) {
    const bit = range.decodeBit(probs, offset + symbol);
    symbol = (symbol << 1) | bit;
    result |= bit << i;
  }
  return result;
}

function decodeLiteral(range: RangeDecoder, probs: Uint16Array, base: number): number {
  let symbol = 1;
  while (symbol < 0x100) {
    symbol = (symbol << 1) | range.decodeBit(probs, base + symbol);
  }
  return symbol - 0x100;
}

function decodeMatchedLiteral(range: RangeDecoder, probs: Uint16Array, base: number, matchByte: number): number {
  let symbol = 1;
  let match = matchByte;
  while (symbol < 0x100) {
    const matchBit = (match >> 7) & 1;
    match = (match << 1) & 0xff;
    const bit = range.decodeBit(probs, base + 0x100 + (matchBit << 8) + symbol);
    symbol = (symbol << 1) | bit;
    if (matchBit !== bit) {
      while (symbol < 0x100) {
        symbol = (symbol << 1) | range.decodeBit(probs, base + symbol);
      }
      break;
    }
  }
  return symbol - 0x100;
}

function nextStateAfterLiteral(state: number): number {
  if (state < 4) return 0;
  if (state < 10) return state - 3;
  return state - 6;
}

/**
 * Decodes `input` (properties header + range-coded data) into exactly
 * `uncompressedSize` bytes. Trailing input after the last symbol is ignored.
 *
 * @throws {LzmaDataError} If the properties are invalid, the stream is truncated, or a match reaches outside the output
 */
export function decodeLzma(input: Uint8Array, uncompressedSize: number): Buffer {
  if (input.length < PROPERTIES_SIZE) {
    throw new LzmaDataError(`LZMA properties need ${PROPERTIES_SIZE} bytes, got ${input.length}`);
  }
  let props = input[0];
  if (props >= 9 * 5 * 5) {
    throw new LzmaDataError(`Invalid LZMA properties byte 0x${props.toString(16)}`);
  }
  const lc = props % 9;
  props = Math.floor(props / 9);
  const lp = props % 5;
  const pb = Math.floor(props / 5);

  const output = new OutputWindow(uncompressedSize);
  if (uncompressedSize === 0) {
    return output.buffer;
  }

  const range = new RangeDecoder(input, PROPERTIES_SIZE);
  const literalProbs = new Uint16Array(0x300 << (lc + lp)).fill(1024);
  const isMatch = new Uint16Array(NUM_STATES << NUM_POS_BITS_MAX).fill(1024);
  const isRep = new Uint16Array(NUM_STATES).fill(1024);
  const isRepG0 = new Uint16Array(NUM_STATES).fill(1024);
  const isRepG1 = new Uint16Array(NUM_STATES).fill(1024);
  const isRepG2 = new Uint16Array(NUM_STATES).fill(1024);
  const isRep0Long = new Uint16Array(NUM_STATES << NUM_POS_BITS_MAX).fill(1024);
  const posSlot = new Uint16Array(NUM_LEN_TO_POS_STATES << NUM_POS_SLOT_BITS).fill(1024);
  const posDecoders = new Uint16Array(NUM_FULL_DISTANCES).fill(1024);
  const align = new Uint16Array(1 << NUM_ALIGN_BITS).fill(1024);
  const lenDecoder = new LenDecoder();
  const repLenDecoder = new LenDecoder();

  const pbMask = (1 << pb) - 1;
  const lpMask = (1 << lp) - 1;
  let state = 0;
  let reps: [number, number, number, number] = [0, 0, 0, 0];

  while (!output.full) {
    const posState = output.written & pbMask;
    const stateIndex = (state << NUM_POS_BITS_MAX) + posState;

    if (range.decodeBit(isMatch, stateIndex) === 0) {
      const context = ((output.written & lpMask) << lc) + (output.prevByte() >> (8 - lc));
      const base = context * 0x300;
      const symbol = state < NUM_LIT_STATES
        ? decodeLiteral(range, literalProbs, base)
        : decodeMatchedLiteral(range, literalProbs, base, output.byteAt(reps[0] + 1));
      output.put(symbol);
      state = nextStateAfterLiteral(state);
      continue;
    }

    let length: number;
    if (range.decodeBit(isRep, state) === 1) {
      if (range.decodeBit(isRepG0, state) === 0) {
        if (range.decodeBit(isRep0Long, stateIndex) === 0) {
          output.put(output.byteAt(reps[0] + 1));
          state = state < NUM_LIT_STATES ? 9 : 11;
          continue;
        }
      } else {
        const [rep0, rep1, rep2, rep3] = reps;
        if (range.decodeBit(isRepG1, state) === 0) {
          reps = [rep1, rep0, rep2, rep3];
        } else if (range.decodeBit(isRepG2, state) === 0) {
          reps = [rep2, rep0, rep1, rep3];
        } else {
          reps = [rep3, rep0, rep1, rep2];
        }
      }
      length = repLenDecoder.decode(range, posState) + MATCH_MIN_LEN;
      state = state < NUM_LIT_STATES ? 8 : 11;
    } else {
      length = lenDecoder.decode(range, posState) + MATCH_MIN_LEN;
      const lenToPosState = Math.min(length - MATCH_MIN_LEN, NUM_LEN_TO_POS_STATES - 1);
      const slot = decodeBitTree(range, posSlot, lenToPosState << NUM_POS_SLOT_BITS, NUM_POS_SLOT_BITS);
      let distance: number;
      if (slot < 4) {
        distance = slot;
      } else {
        const directBits = (slot >> 1) - 1;
        distance = ((2 | (slot & 1)) << directBits) >>> 0;
        if (slot < END_POS_MODEL_INDEX) {
          distance += decodeReverseBitTree(range, posDecoders, distance - slot, directBits);
        } else {
          distance += range.decodeDirectBits(directBits - NUM_ALIGN_BITS) * (1 << NUM_ALIGN_BITS);
          distance += decodeReverseBitTree(range, align, 0, NUM_ALIGN_BITS);
        }
      }
      reps = [distance, reps[0], reps[1], reps[2]];
      state = state < NUM_LIT_STATES ? 7 : 10;
    }

    output.copyMatch(reps[0] + 1, length);
  }

  return output.buffer;
}
