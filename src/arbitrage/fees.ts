/**
 * Fee Model - per-marketplace seller fees and net proceeds
 *
 * Fees are percentage + optional flat component. Shipping and sales tax
 * are not modelled; callers account for them.
 */

import { UnknownFeeScheduleError } from '../utils/errors';
import { applyBasisPointsCeil, percentToBasisPoints } from '../utils/money';
import type { Cents } from '../utils/money';
import { compareText, marketplaceKey } from '../listing/identity';
import type { FeeModel, FeeModelOptions, FeeSchedule, FeeScheduleTable } from './types';

// Default seller fee schedules by marketplace
export const DEFAULT_FEE_SCHEDULES: FeeScheduleTable = {
  'StockX': { ratePct: 9.5, flatFee: 0 },
  'GOAT': { ratePct: 9.5, flatFee: 0 },
  'Flight Club': { ratePct: 9.5, flatFee: 0 },
  'eBay': { ratePct: 13.25, flatFee: 0 },
  'Grailed': { ratePct: 9, flatFee: 0 },
  'Kicks Crew': { ratePct: 8, flatFee: 0 },
};

const NO_FEE: FeeSchedule = { ratePct: 0, flatFee: 0 };

/**
 * Overlay schedules on a base table. Later entries win, matched by
 * normalized marketplace name.
 */
export function mergeFeeSchedules(
  base: FeeScheduleTable,
  overrides: FeeScheduleTable = {},
): Record<string, FeeSchedule> {
  const merged: Record<string, FeeSchedule> = {};
  for (const table of [base, overrides]) {
    for (const [marketplace, schedule] of Object.entries(table)) {
      merged[marketplaceKey(marketplace)] = { ...schedule };
    }
  }
  return merged;
}

export function createFeeModel(
  table: FeeScheduleTable = DEFAULT_FEE_SCHEDULES,
  options: FeeModelOptions = {},
): FeeModel {
  const schedules = new Map(Object.entries(mergeFeeSchedules(table)));
  const assumeNoFee = options.assumeNoFee === true;

  function scheduleFor(marketplace: string): FeeSchedule {
    const schedule = schedules.get(marketplaceKey(marketplace));
    if (schedule) return schedule;
    if (assumeNoFee) return NO_FEE;
    throw new UnknownFeeScheduleError(marketplace);
  }

  function feeFor(marketplace: string, grossPrice: Cents): Cents {
    const schedule = scheduleFor(marketplace);
    return applyBasisPointsCeil(grossPrice, percentToBasisPoints(schedule.ratePct)) + schedule.flatFee;
  }

  return {
    assumeNoFee,

    hasSchedule(marketplace: string): boolean {
      return schedules.has(marketplaceKey(marketplace));
    },

    scheduleFor,

    feeFor,

    netProceeds(marketplace: string, grossPrice: Cents): Cents {
      return grossPrice - feeFor(marketplace, grossPrice);
    },

    entries(): Array<[string, FeeSchedule]> {
      return Array.from(schedules.entries()).sort(([a], [b]) => compareText(a, b));
    },
  };
}
