/**
 * Admission control for the three resource limits.
 * Holds the running totals for a single run.
 */

export interface Limits {
  /** Maximum number of admitted files */
  maxFiles: number;
  /** Maximum cumulative size of admitted files, in bytes */
  maxTotalSize: number;
  /** Maximum size of any single file, in bytes */
  maxFileSize: number;
}

export interface RunningTotals {
  filesAdmitted: number;
  bytesAdmitted: number;
}

export type LimitReason =
  | "file-count-limit"
  | "total-size-limit"
  | "per-file-size-limit";

export type AdmitDecision =
  | { admitted: true }
  | { admitted: false; reason: LimitReason };

interface AdmissionRule {
  reason: LimitReason;
  rejects: (totals: RunningTotals, limits: Limits, size: number) => boolean;
}

/**
 * Evaluated in order; the first rule that rejects decides the reason.
 * A file can break several limits at once, so the order is part of the contract.
 */
const ADMISSION_RULES: readonly AdmissionRule[] = [
  {
    reason: "file-count-limit",
    rejects: (totals, limits) => totals.filesAdmitted >= limits.maxFiles,
  },
  {
    reason: "total-size-limit",
    rejects: (totals, limits, size) => totals.bytesAdmitted + size > limits.maxTotalSize,
  },
  {
    reason: "per-file-size-limit",
    rejects: (_totals, limits, size) => size > limits.maxFileSize,
  },
];

export class Limiter {
  private filesAdmitted = 0;
  private bytesAdmitted = 0;
  private readonly limits: Readonly<Limits>;

  constructor(limits: Limits) {
    this.limits = Object.freeze({ ...limits });
  }

  /**
   * Decide whether a file of the given size fits. Does not change the totals;
   * call commit() once the file's content has actually been stored.
   */
  admit(size: number): AdmitDecision {
    const totals = this.getTotals();
    for (const rule of ADMISSION_RULES) {
      if (rule.rejects(totals, this.limits, size)) {
        return { admitted: false, reason: rule.reason };
      }
    }
    return { admitted: true };
  }

  /**
   * Count an admitted file toward the running totals.
   */
  commit(size: number): void {
    this.filesAdmitted += 1;
    this.bytesAdmitted += size;
  }

  getTotals(): RunningTotals {
    return {
      filesAdmitted: this.filesAdmitted,
      bytesAdmitted: this.bytesAdmitted,
    };
  }

  getLimits(): Limits {
    return { ...this.limits };
  }
}
