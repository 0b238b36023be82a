import { UserInputError } from '@vendure/core';

export interface InvoiceLineInput {
    description: string;
    quantity: number;
    /** Minor units */
    unitPrice: number;
}

export interface InvoiceLine extends InvoiceLineInput {
    amount: number;
}

export interface InvoiceTotals {
    lines: InvoiceLine[];
    subtotal: number;
    taxAmount: number;
    discountAmount: number;
    total: number;
}

/**
 * Computes line amounts and totals in minor units. The subtotal is the sum of
 * the rounded line amounts, so the items of a stored invoice always add up to it.
 */
export function calculateInvoiceTotals(
    lines: InvoiceLineInput[],
    taxRate: number,
    discountAmount = 0,
): InvoiceTotals {
    if (!lines.length) {
        throw new UserInputError('An invoice needs at least one item');
    }
    if (taxRate < 0 || taxRate > 100) {
        throw new UserInputError(`Tax rate must be between 0 and 100, got ${taxRate}`);
    }
    const computed = lines.map(line => {
        if (!(line.quantity > 0)) {
            throw new UserInputError(`Quantity of "${line.description}" must be positive`);
        }
        if (!Number.isInteger(line.unitPrice) || line.unitPrice < 0) {
            throw new UserInputError(`Unit price of "${line.description}" must be a non-negative integer`);
        }
        return { ...line, amount: Math.round(line.quantity * line.unitPrice) };
    });
    const subtotal = computed.reduce((sum, line) => sum + line.amount, 0);
    const taxAmount = Math.round((subtotal * taxRate) / 100);
    if (!Number.isInteger(discountAmount) || discountAmount < 0 || discountAmount > subtotal + taxAmount) {
        throw new UserInputError(`Discount must be between 0 and ${subtotal + taxAmount}`);
    }
    return {
        lines: computed,
        subtotal,
        taxAmount,
        discountAmount,
        total: subtotal + taxAmount - discountAmount,
    };
}

function pad(value: number, length = 2): string {
    return String(value).padStart(length, '0');
}

/**
 * `<prefix>-YYYYMMDDHHMMSS-NNNN`, timestamp in UTC.
 */
export function generateInvoiceNumber(prefix: string, now: Date, random: () => number = Math.random): string {
    const stamp =
        `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}` +
        `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
    const suffix = pad(Math.floor(random() * 10_000), 4);
    return `${prefix}-${stamp}-${suffix}`;
}
