/**
 * Transaction form rules
 *
 * Field-level validation for create/update, and the mapping between an
 * employee's profile category and the outgoing category used for their pay.
 */

import {
    BILLED_INCOMING_CATEGORY,
    INCOMING_CATEGORIES,
    OUTGOING_CATEGORIES,
    isTxType,
} from '../constants.js';

/** Field name → message */
export type FieldErrors = Record<string, string>;

export interface TransactionDraft {
    type: string;
    category: string;
    amount: number;
    billNo?: string | null;
}

export function validateTransactionDraft(draft: TransactionDraft): FieldErrors {
    const errors: FieldErrors = {};

    if (!isTxType(draft.type)) {
        errors.type = 'Invalid type.';
    }

    if (!Number.isFinite(draft.amount) || draft.amount <= 0) {
        errors.amount = 'Amount must be greater than 0.';
    }

    if (draft.type === 'incoming') {
        if (!(INCOMING_CATEGORIES as readonly string[]).includes(draft.category)) {
            errors.category = 'Invalid incoming source.';
        }
        if (draft.category === BILLED_INCOMING_CATEGORY && !(draft.billNo ?? '').trim()) {
            errors.billNo = 'Bill Number is required for Client payments.';
        }
    }

    if (draft.type === 'outgoing' && !(OUTGOING_CATEGORIES as readonly string[]).includes(draft.category)) {
        errors.category = 'Invalid outgoing category.';
    }

    return errors;
}

export function hasFieldErrors(errors: FieldErrors): boolean {
    return Object.keys(errors).length > 0;
}

/**
 * Outgoing category for a payment to an employee, from their profile category.
 *
 * @example
 * employeeOutgoingCategory('Factory Worker (Karkhanay Wala)') // "Karkhanay Wala"
 * employeeOutgoingCategory('Office Staff') // "Employee"
 */
export function employeeOutgoingCategory(employeeCategory: string | null | undefined): string {
    const c = (employeeCategory ?? '').toLowerCase();
    if (c.includes('karkhan') || c.includes('factory')) return 'Karkhanay Wala';
    if (c.includes('polish')) return 'Polish Wala';
    if (c.includes('poshish') || c.includes('upholstery')) return 'Poshish Wala';
    return 'Employee';
}

/**
 * Employee profile category for a person first seen as a transaction name.
 * Inverse direction of `employeeOutgoingCategory`; unknown → Helper / Mazdoor.
 */
export function mapToEmployeeCategory(txCategory: string | null | undefined): string {
    const c = (txCategory ?? '').toLowerCase();
    if (c.includes('karkhan') || c.includes('factory')) return 'Factory Worker (Karkhanay Wala)';
    if (c.includes('polish')) return 'Polish Worker';
    if (c.includes('poshish') || c.includes('upholstery')) return 'Upholstery / Poshish Worker';
    return 'Helper / Mazdoor';
}
