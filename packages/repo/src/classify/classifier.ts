import nodeFs from 'node:fs/promises';
import path from 'node:path';

type Fs = typeof nodeFs;

/** Files above this size are never summarized. */
export const MAX_TEXT_FILE_BYTES = 50 * 1024 * 1024;
/** Bytes read from the head of a file when its extension is not allow-listed. */
export const SAMPLE_BYTES = 1024;
export const MIN_PRINTABLE_RATIO = 0.8;

type Decoder = (sample: Buffer) => string;

/** Tried in order until a clean decode clears the printable threshold. */
const DECODERS: ReadonlyArray<[string, Decoder]> = [
  // stream: true leaves a multi-byte sequence cut at the window edge pending instead of failing
  ['utf-8', (sample) => new TextDecoder('utf-8', { fatal: true }).decode(sample, { stream: true })],
  ['latin1', (sample) => sample.toString('latin1')],
  ['windows-1252', (sample) => new TextDecoder('windows-1252', { fatal: true }).decode(sample)],
];

const NON_PRINTABLE = /^[\p{C}\p{Z}]$/u;
const WHITESPACE_CONTROLS = new Set(['\n', '\r', '\t']);

export function isPrintable(char: string): boolean {
  return char === ' ' || !NON_PRINTABLE.test(char);
}

/** Fraction of code points that are printable or newline, carriage return or tab. */
export function printableRatio(text: string): number {
  let total = 0;
  let printable = 0;
  for (const char of text) {
    total++;
    if (isPrintable(char) || WHITESPACE_CONTROLS.has(char)) {
      printable++;
    }
  }
  return total === 0 ? 0 : printable / total;
}

export interface TextClassifierOptions {
  textExtensions: ReadonlySet<string>;
}

/**
 * Heuristic text detection: size ceiling, extension allow-list, then a
 * NUL-byte and printable-ratio check on the first {@link SAMPLE_BYTES} bytes.
 */
export class TextClassifier {
  private readonly textExtensions: ReadonlySet<string>;
  private readonly fs: Fs;

  constructor(options: TextClassifierOptions, fs: Fs = nodeFs) {
    this.textExtensions = options.textExtensions;
    this.fs = fs;
  }

  async isText(filePath: string): Promise<boolean> {
    let size: number;
    try {
      const stats = await this.fs.stat(filePath);
      if (!stats.isFile()) return false;
      size = stats.size;
    } catch {
      return false;
    }
    if (size > MAX_TEXT_FILE_BYTES) return false;

    if (this.textExtensions.has(path.extname(filePath).toLowerCase())) {
      return true;
    }

    let sample: Buffer;
    try {
      sample = await this.readSample(filePath);
    } catch {
      return false;
    }
    if (sample.includes(0)) return false;

    for (const [, decode] of DECODERS) {
      let text: string;
      try {
        text = decode(sample);
      } catch {
        continue;
      }
      if (text.length > 0 && printableRatio(text) > MIN_PRINTABLE_RATIO) {
        return true;
      }
    }
    return false;
  }

  private async readSample(filePath: string): Promise<Buffer> {
    const handle = await this.fs.open(filePath, 'r');
    try {
      const buffer = Buffer.alloc(SAMPLE_BYTES);
      const { bytesRead } = await handle.read(buffer, 0, SAMPLE_BYTES, 0);
      return buffer.subarray(0, bytesRead);
    } finally {
      await handle.close();
    }
  }
}
