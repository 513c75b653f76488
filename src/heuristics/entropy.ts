/**
 * Shannon Entropy Analysis
 *
 * Program code and data sit well below 8 bits per byte. A freshly
 * decrypted image that measures close to 8 is still scrambled, which
 * usually means the key does not belong to the image.
 */

export class EntropyCalculator {
  private readonly frequencies = new Float64Array(256);
  private totalBytes = 0;

  update(chunk: Uint8Array): void {
    this.totalBytes += chunk.length;
    for (let i = 0; i < chunk.length; i++) {
      this.frequencies[chunk[i]]++;
    }
  }

  digest(): number {
    if (this.totalBytes === 0) return 0;
    let entropy = 0;
    for (const count of this.frequencies) {
      if (count === 0) continue;
      const p = count / this.totalBytes;
      entropy -= p * Math.log2(p);
    }
    return entropy;
  }
}

/**
 * Formula: H(X) = - sum(P(xi) * log2(P(xi)))
 *
 * @returns bits per byte, between 0 and 8
 */
export function calculateEntropy(input: Uint8Array): number {
  const calculator = new EntropyCalculator();
  calculator.update(input);
  return calculator.digest();
}
