export interface SpamCheckResultData {
  spam: boolean;
  confidence: number;
  reasons: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return undefined;
}

/** Accepts numbers and numeric strings ("0.75") between 0 and 1, rejects everything else. */
function toConfidence(value: unknown): number {
  const n = toNumber(value);
  if (n !== undefined && Number.isFinite(n) && n >= 0 && n <= 1) return n;
  throw new TypeError(`Invalid confidence value: ${JSON.stringify(value)}`);
}

function toReasons(value: unknown): readonly string[] {
  if (value === undefined || value === null) return Object.freeze([]);
  if (!Array.isArray(value)) {
    throw new TypeError(`Invalid reasons value: ${JSON.stringify(value)}`);
  }
  return Object.freeze(value.map((r) => String(r)));
}

/**
 * Outcome of one spam check. Read-only once built; the reasons list is
 * copied out of the response data, so mutating that data afterwards has
 * no effect on the result.
 */
export class SpamCheckResult {
  readonly spam: boolean;
  readonly confidence: number;
  readonly reasons: readonly string[];

  private constructor(spam: boolean, confidence: number, reasons: readonly string[]) {
    this.spam = spam;
    this.confidence = confidence;
    this.reasons = reasons;
    Object.freeze(this);
  }

  /** Parse a decoded API response body. Throws `TypeError` on a malformed body. */
  static fromJSON(data: unknown): SpamCheckResult {
    if (!isRecord(data)) {
      throw new TypeError('Spam check response must be a JSON object');
    }
    if (typeof data.spam !== 'boolean') {
      throw new TypeError(`Invalid spam value: ${JSON.stringify(data.spam)}`);
    }
    return new SpamCheckResult(data.spam, toConfidence(data.confidence), toReasons(data.reasons));
  }

  isSpam(): boolean {
    return this.spam;
  }

  isLegitimate(): boolean {
    return !this.spam;
  }

  /** Confidence as a percentage with one decimal, e.g. "12.5". */
  confidencePercent(): string {
    return (Math.round(this.confidence * 1000) / 10).toFixed(1);
  }

  summary(): string {
    if (this.spam) {
      return `Spam detected (${this.confidencePercent()}% confidence): ${this.reasons.join(', ')}`;
    }
    // Legitimate results never list reasons
    return `Content appears legitimate (${this.confidencePercent()}% confidence)`;
  }

  toJSON(): SpamCheckResultData {
    return {
      spam: this.spam,
      confidence: this.confidence,
      reasons: [...this.reasons],
    };
  }
}
