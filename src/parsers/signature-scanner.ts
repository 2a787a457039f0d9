/**
 * Streaming search for a byte signature followed by a dotted version,
 * e.g. the "BusyBox v1.32.0" banner compiled into BusyBox binaries.
 *
 * The scanner is fed chunk by chunk so that large executables never have
 * to be held in memory. Partial matches carry across chunk boundaries.
 */

const DOT = 0x2e;
const DIGIT_0 = 0x30;
const DIGIT_9 = 0x39;

function isVersionByte(byte: number): boolean {
  return byte === DOT || (byte >= DIGIT_0 && byte <= DIGIT_9);
}

/**
 * Knuth-Morris-Pratt failure table: for each prefix length, the length of
 * the longest proper prefix that is also a suffix.
 */
function buildFailureTable(signature: Uint8Array): number[] {
  const table: number[] = new Array<number>(signature.length).fill(0);
  let k = 0;

  for (let i = 1; i < signature.length; i++) {
    while (k > 0 && signature[i] !== signature[k]) {
      k = table[k - 1] ?? 0;
    }
    if (signature[i] === signature[k]) {
      k++;
    }
    table[i] = k;
  }

  return table;
}

export interface SignatureScannerOptions {
  /** ASCII signature that must precede the version, e.g. "BusyBox v". */
  signature: string;
  /** Minimum number of digit/dot characters for a version to count. */
  minVersionLength: number;
}

/**
 * Incremental signature-plus-version matcher.
 *
 * Usage:
 *   const scanner = new SignatureScanner({ signature: "BusyBox v", minVersionLength: 6 });
 *   for (const chunk of chunks) {
 *     if (scanner.feed(chunk)) break;
 *   }
 *   const version = scanner.finish();
 */
export class SignatureScanner {
  private readonly signature: Uint8Array;
  private readonly failure: number[];
  private readonly minVersionLength: number;

  /** Number of signature bytes matched so far. */
  private matched = 0;
  /** Version characters collected after a full signature match. */
  private version = "";
  private result: string | null = null;

  constructor(options: SignatureScannerOptions) {
    if (options.signature.length === 0) {
      throw new RangeError("signature must not be empty");
    }
    this.signature = new TextEncoder().encode(options.signature);
    this.failure = buildFailureTable(this.signature);
    this.minVersionLength = options.minVersionLength;
  }

  /** True once a complete signature + version has been found. */
  get found(): boolean {
    return this.result !== null;
  }

  /**
   * Consume the next chunk.
   *
   * @returns True when the match is complete and further input is not needed.
   */
  feed(chunk: Uint8Array): boolean {
    if (this.result !== null) {
      return true;
    }

    for (const byte of chunk) {
      if (this.matched === this.signature.length) {
        if (isVersionByte(byte)) {
          this.version += String.fromCharCode(byte);
          continue;
        }
        if (this.version.length >= this.minVersionLength) {
          this.result = this.version;
          return true;
        }
        // Too short to be a version: drop it and let this byte restart the search
        this.matched = 0;
        this.version = "";
      }
      this.advance(byte);
    }

    return false;
  }

  /**
   * Signal end of input.
   *
   * A version that runs up to the last byte of the file still counts
   * when it is long enough.
   *
   * @returns The version characters (without the signature), or null.
   */
  finish(): string | null {
    if (
      this.result === null &&
      this.matched === this.signature.length &&
      this.version.length >= this.minVersionLength
    ) {
      this.result = this.version;
    }
    return this.result;
  }

  private advance(byte: number): void {
    while (this.matched > 0 && byte !== this.signature[this.matched]) {
      this.matched = this.failure[this.matched - 1] ?? 0;
    }
    if (byte === this.signature[this.matched]) {
      this.matched++;
    }
  }
}

/**
 * Scan a sequence of chunks for `signature` followed by a version.
 *
 * Stops pulling chunks as soon as the match completes, so an iterator
 * backed by a file handle is closed early.
 */
export function scanForSignatureVersion(
  chunks: Iterable<Uint8Array>,
  options: SignatureScannerOptions
): string | null {
  const scanner = new SignatureScanner(options);

  for (const chunk of chunks) {
    if (scanner.feed(chunk)) {
      break;
    }
  }

  return scanner.finish();
}
