/**
 * Verification Result
 *
 * A graded outcome built from partial results. Severity is always derived
 * from the partials, so combining with an empty Result changes nothing.
 */

export type Severity = 'OK' | 'WARN' | 'FAIL';

export const SEVERITY_RANK: Record<Severity, number> = {
  OK: 0,
  WARN: 1,
  FAIL: 2,
};

export interface PartialResult {
  readonly severity: Severity;
  readonly message: string;
}

export function dominantSeverity(severities: Iterable<Severity>): Severity {
  let dominant: Severity = 'OK';
  for (const severity of severities) {
    if (SEVERITY_RANK[severity] > SEVERITY_RANK[dominant]) dominant = severity;
  }
  return dominant;
}

export class Result {
  private readonly partials: PartialResult[] = [];

  constructor();
  constructor(severity: Severity, message: string);
  constructor(severity?: Severity, message?: string) {
    if (severity !== undefined) {
      this.partials.push({ severity, message: message ?? '' });
    }
  }

  /** Fold any number of results left to right. */
  static combine(...results: Result[]): Result {
    return results.reduce((acc, r) => acc.combine(r), new Result());
  }

  get partialResults(): readonly PartialResult[] {
    return [...this.partials];
  }

  get severity(): Severity {
    return dominantSeverity(this.partials.map(p => p.severity));
  }

  get success(): boolean {
    return !this.partials.some(p => p.severity === 'FAIL');
  }

  /** True when no partial was ever added */
  get empty(): boolean {
    return this.partials.length === 0;
  }

  addPartial(severity: Severity, message: string): this {
    this.partials.push({ severity, message });
    return this;
  }

  combine(other: Result): Result {
    const combined = new Result();
    for (const p of [...this.partials, ...other.partials]) {
      combined.addPartial(p.severity, p.message);
    }
    return combined;
  }

  /** This result, or `fallback` if nothing was recorded. */
  orElse(fallback: Result): Result {
    return this.empty ? fallback : this;
  }

  equals(other: Result): boolean {
    const theirs = other.partials;
    return this.partials.length === theirs.length
      && this.partials.every((p, i) => p.severity === theirs[i].severity && p.message === theirs[i].message);
  }

  toString(): string {
    return this.partials.map(p => `[${p.severity}] ${p.message}`).join('\n');
  }

  /** Report rendered by the CLI */
  format(): string {
    const lines = ['Checks:'];
    if (!this.empty) lines.push(this.toString());
    lines.push('', `Overall result: ${this.success ? 'OK' : 'FAIL'} (${this.severity})`);
    return lines.join('\n');
  }
}
