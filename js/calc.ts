/**
 * @fileoverview Calculation Engine - Studio & Print Cost Preview
 *
 * This module implements the costing rules applied before an invoice is generated.
 * It is side-effect free apart from debug logging: same inputs always produce the
 * same outputs, and dirty data never raises.
 *
 * ## Module Responsibility
 * - Price each studio project from its hours and studio type
 * - Price each print line from sell price and quantity
 * - Split both into CORE and OAB totals
 * - Produce a per-project breakdown (studio cost + print cost)
 *
 * ## Key Dependencies
 * - `reconcile.js` - read-time defaults for type and billing category
 * - `utils.js` - numeric coercion and rounding
 * - `constants.js` - rate table
 *
 * ## Data Flow
 * Input: StudioJobRecord[] (after timesheet merge / edits), ProductionLineItem[] (print rows)
 * Processing:
 *   1. Studio: hours (null/non-numeric → 0) × rate for the effective type
 *   2. Print: Production Sell Price × Total including Spares (non-numeric → 0)
 *   3. Print billing category looked up from the studio table by project ref
 *   4. Sum by category and by project
 * Output: CostPreview
 *
 * ## Business Rules
 *
 * ### Rates (GBP per hour)
 * - Artwork 49.5, Creative Artwork 57, Digital 49.5
 * - Any other type is charged at DEFAULT_STUDIO_RATE
 *
 * ### Billing Category
 * - Studio rows use their own Core/OAB (CORE when unset)
 * - Print rows inherit the Core/OAB of their project; lines whose project is not
 *   in the studio table are CORE
 *
 * ### Totals
 * - core = studio CORE + print CORE; oab likewise; grand = core + oab
 * - Every currency total is rounded to 2 decimals where it is summed
 */

import { CONSTANTS, DEFAULT_CORE_OR_OAB, STUDIO_RATES } from './constants.js';
import { createLogger } from './logger.js';
import { effectiveCoreOrOab, effectiveType } from './reconcile.js';
import type {
    CoreOrOab,
    CostPreview,
    CostTotals,
    PrintCostRow,
    ProductionLineItem,
    ProjectCostSummary,
    StudioCostRow,
    StudioJobRecord,
} from './types.js';
import { cellText, round, toNumber } from './utils.js';

const log = createLogger('Calc');

// ==================== RATES ====================

/**
 * Hourly rate for a studio type.
 *
 * @param type - Studio type (free text accepted)
 * @returns Rate from STUDIO_RATES, or the default rate for unknown types
 */
export function rateForType(type: string): number {
    switch (type) {
        case 'Artwork':
        case 'Creative Artwork':
        case 'Digital':
            return STUDIO_RATES[type];
        default:
            return CONSTANTS.DEFAULT_STUDIO_RATE;
    }
}

// ==================== ROW COSTS ====================

/**
 * Attaches rate and cost to each studio record.
 */
export function costStudioRows(studio: readonly StudioJobRecord[]): StudioCostRow[] {
    return studio.map((record) => {
        const type = effectiveType(record);
        const hours = toNumber(record.studioHours);
        const rate = rateForType(type);
        return {
            record,
            type,
            coreOrOab: effectiveCoreOrOab(record),
            hours,
            rate,
            studioCost: round(hours * rate, 4),
        };
    });
}

/**
 * Attaches billing category and cost to each print line.
 *
 * @param print - Print table rows
 * @param studio - Studio records used for the Core/OAB lookup
 */
export function costPrintRows(
    print: readonly ProductionLineItem[],
    studio: readonly StudioJobRecord[]
): PrintCostRow[] {
    const categoryByRef = new Map<string, CoreOrOab>(
        studio.map((record) => [record.projectRef, effectiveCoreOrOab(record)])
    );

    return print.map((line) => {
        const sellPrice = toNumber(line.productionSellPrice);
        const quantity = toNumber(line.totalIncludingSpares);
        const projectRef = cellText(line.projectRef);
        const coreOrOab = (projectRef !== null ? categoryByRef.get(projectRef) : undefined) ?? DEFAULT_CORE_OR_OAB;
        return {
            line,
            coreOrOab,
            sellPrice,
            quantity,
            totalCost: round(sellPrice * quantity, 4),
        };
    });
}

// ==================== TOTALS ====================

function sumCosts<T>(rows: readonly T[], cost: (row: T) => number): number {
    return round(
        rows.reduce((sum, row) => sum + cost(row), 0),
        2
    );
}

/**
 * Splits studio and print costs into CORE and OAB totals.
 */
export function computeTotals(studio: readonly StudioCostRow[], print: readonly PrintCostRow[]): CostTotals {
    const studioCore = sumCosts(studio.filter((row) => row.coreOrOab === 'CORE'), (row) => row.studioCost);
    const studioOab = sumCosts(studio.filter((row) => row.coreOrOab === 'OAB'), (row) => row.studioCost);
    const printCore = sumCosts(print.filter((row) => row.coreOrOab === 'CORE'), (row) => row.totalCost);
    const printOab = sumCosts(print.filter((row) => row.coreOrOab === 'OAB'), (row) => row.totalCost);

    const core = round(studioCore + printCore, 2);
    const oab = round(studioOab + printOab, 2);

    return {
        studioCore,
        studioOab,
        printCore,
        printOab,
        core,
        oab,
        grand: round(core + oab, 2),
    };
}

/**
 * Per-project breakdown: studio cost plus the cost of the project's print lines.
 * Projects appear in studio table order; print lines of unknown projects are
 * counted only in the totals.
 */
export function summarizeProjects(
    studio: readonly StudioCostRow[],
    print: readonly PrintCostRow[]
): ProjectCostSummary[] {
    const printByRef = new Map<string, number>();
    for (const row of print) {
        const projectRef = cellText(row.line.projectRef);
        if (projectRef === null) continue;
        printByRef.set(projectRef, (printByRef.get(projectRef) ?? 0) + row.totalCost);
    }

    return studio.map((row) => {
        const productionCost = round(printByRef.get(row.record.projectRef) ?? 0, 2);
        const studioCost = round(row.studioCost, 2);
        return {
            projectRef: row.record.projectRef,
            projectDescription: row.record.projectDescription,
            lines: row.record.lines,
            studioHours: row.hours,
            coreOrOab: row.coreOrOab,
            studioCost,
            productionCost,
            totalCost: round(studioCost + productionCost, 2),
        };
    });
}

// ==================== MAIN ENTRY POINT ====================

/**
 * Computes the full cost preview for the current studio and print tables.
 *
 * @param studio - Studio records (after timesheet merge and edits)
 * @param print - Print table rows
 * @returns Row-level costs, category totals and the per-project breakdown
 *
 * @example
 * const preview = computeCostPreview(studioRecords, printRows);
 * console.log(preview.totals.grand);
 */
export function computeCostPreview(
    studio: readonly StudioJobRecord[],
    print: readonly ProductionLineItem[]
): CostPreview {
    const studioRows = costStudioRows(studio);
    const printRows = costPrintRows(print, studio);
    const totals = computeTotals(studioRows, printRows);

    log.debug(`Cost preview: core ${totals.core}, oab ${totals.oab}, grand ${totals.grand}`);

    return {
        studio: studioRows,
        print: printRows,
        totals,
        projects: summarizeProjects(studioRows, printRows),
        hasStudioHours: studioRows.some((row) => row.hours !== 0),
    };
}
