import { errorCategory, errorMessage, type ErrorCategory } from './errors';

export interface ReportWarning {
  category: ErrorCategory | 'unknown';
  type: string;
  count: number;
  /** First message seen for this kind of failure */
  sample: string;
}

/** Aggregates non-fatal failures of a run into one line per kind */
export class WarningCollector {
  private readonly warnings = new Map<string, ReportWarning>();

  add(error: unknown): void {
    const category = errorCategory(error) ?? 'unknown';
    const type = error instanceof Error ? error.name : 'Error';
    const key = `${category}:${type}`;
    const existing = this.warnings.get(key);
    if (existing) {
      existing.count++;
      return;
    }
    this.warnings.set(key, { category, type, count: 1, sample: errorMessage(error) });
  }

  get total(): number {
    let total = 0;
    for (const warning of this.warnings.values()) total += warning.count;
    return total;
  }

  list(): ReportWarning[] {
    return [...this.warnings.values()].sort((a, b) => b.count - a.count);
  }
}
