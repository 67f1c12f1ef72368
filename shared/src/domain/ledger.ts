/**
 * Ledger totals
 *
 * Amounts are stored positive; the entry type decides which side they
 * count towards. Net is income minus expense.
 */

import type { LedgerTotals } from '../types/index.js';
import type { EntryType } from './constants.js';

export interface LedgerAmount {
    type: EntryType;
    amount: number;
}

export function summarizeLedger(entries: readonly LedgerAmount[]): LedgerTotals {
    let totalIncome = 0;
    let totalExpense = 0;

    for (const entry of entries) {
        if (entry.type === 'income') {
            totalIncome += entry.amount;
        } else {
            totalExpense += entry.amount;
        }
    }

    return { totalIncome, totalExpense, net: totalIncome - totalExpense };
}
