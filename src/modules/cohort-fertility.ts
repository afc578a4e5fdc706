/**
 * Cohort Fertility Ledger
 *
 * Tracks, per birth year, how many girls were born that year and how many
 * children those women went on to have. Once a cohort has lived through its
 * fertile years, births / females is its completed fertility.
 */

import { Count, Year } from '../framework/types.js';
import { NoDataError } from '../framework/errors.js';

export interface CohortData {
  /** Girls born in the cohort's year (exposure base) */
  females: Count;
  /** Children borne by women of the cohort, over all their fertile years */
  births: Count;
}

export interface CohortRecord extends CohortData {
  year: Year;
}

/**
 * Completed fertility of one cohort.
 */
export function cohortRatio(cohort: CohortData): number {
  if (cohort.females === 0) {
    throw new NoDataError(`Cohort has no females (births: ${cohort.births})`);
  }
  return cohort.births / cohort.females;
}

/**
 * Birth-year keyed ledger. Years may be negative: mothers alive at the
 * start of a run were born before year 0.
 */
export class CohortFertility {
  private readonly cohorts = new Map<Year, CohortData>();

  private entry(year: Year): CohortData {
    let cohort = this.cohorts.get(year);
    if (cohort === undefined) {
      cohort = { females: 0, births: 0 };
      this.cohorts.set(year, cohort);
    }
    return cohort;
  }

  addBirths(motherBirthYear: Year, births: Count): void {
    this.entry(motherBirthYear).births += births;
  }

  addFemales(year: Year, females: Count): void {
    this.entry(year).females += females;
  }

  get(year: Year): Readonly<CohortData> | undefined {
    return this.cohorts.get(year);
  }

  get size(): number {
    return this.cohorts.size;
  }

  /** Birth years in ascending order */
  years(): Year[] {
    return [...this.cohorts.keys()].sort((a, b) => a - b);
  }

  /** Cohorts in ascending birth-year order */
  entries(): CohortRecord[] {
    return this.years().map(year => {
      const { females, births } = this.entry(year);
      return { year, females, births };
    });
  }

  /**
   * Copy holding only cohorts born in [from, to]. An inverted range gives an empty ledger.
   */
  retainRange(from: Year, to: Year): CohortFertility {
    const trimmed = new CohortFertility();
    for (const { year, females, births } of this.entries()) {
      if (year >= from && year <= to) {
        trimmed.cohorts.set(year, { females, births });
      }
    }
    return trimmed;
  }

  ratio(year: Year): number {
    const cohort = this.cohorts.get(year);
    if (cohort === undefined) {
      throw new NoDataError(`No cohort recorded for year ${year}`);
    }
    return cohortRatio(cohort);
  }

  /**
   * Mean completed fertility over all cohorts in the ledger.
   */
  avg(): number {
    if (this.cohorts.size === 0) {
      throw new NoDataError('No cohorts to average; the cohort window is empty');
    }
    let sum = 0;
    for (const cohort of this.cohorts.values()) {
      sum += cohortRatio(cohort);
    }
    return sum / this.cohorts.size;
  }

  toJSON(): CohortRecord[] {
    return this.entries();
  }
}
