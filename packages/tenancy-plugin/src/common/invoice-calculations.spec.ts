import { describe, expect, it } from 'vitest';

import { calculateInvoiceTotals, generateInvoiceNumber } from './invoice-calculations';

describe('calculateInvoiceTotals()', () => {
    it('rounds each line and derives tax from the subtotal', () => {
        const totals = calculateInvoiceTotals(
            [
                { description: 'Seats', quantity: 2, unitPrice: 1500 },
                { description: 'Extra storage', quantity: 1.5, unitPrice: 999 },
            ],
            10,
            100,
        );
        expect(totals.lines.map(line => line.amount)).toEqual([3000, 1499]);
        expect(totals.subtotal).toBe(4499);
        expect(totals.taxAmount).toBe(450);
        expect(totals.discountAmount).toBe(100);
        expect(totals.total).toBe(4849);
    });

    it('keeps the subtotal equal to the sum of the line amounts', () => {
        const totals = calculateInvoiceTotals(
            [
                { description: 'A', quantity: 0.333, unitPrice: 1000 },
                { description: 'B', quantity: 0.333, unitPrice: 1000 },
                { description: 'C', quantity: 0.333, unitPrice: 1000 },
            ],
            0,
        );
        expect(totals.subtotal).toBe(totals.lines.reduce((sum, line) => sum + line.amount, 0));
        expect(totals.total).toBe(999);
    });

    it('rejects an empty invoice', () => {
        expect(() => calculateInvoiceTotals([], 0)).toThrow('An invoice needs at least one item');
    });

    it('rejects a tax rate above 100', () => {
        expect(() => calculateInvoiceTotals([{ description: 'A', quantity: 1, unitPrice: 100 }], 101)).toThrow(
            'Tax rate must be between 0 and 100, got 101',
        );
    });

    it('rejects a zero quantity', () => {
        expect(() => calculateInvoiceTotals([{ description: 'A', quantity: 0, unitPrice: 100 }], 0)).toThrow(
            'Quantity of "A" must be positive',
        );
    });

    it('rejects a fractional unit price', () => {
        expect(() => calculateInvoiceTotals([{ description: 'A', quantity: 1, unitPrice: 10.5 }], 0)).toThrow(
            'Unit price of "A" must be a non-negative integer',
        );
    });

    it('rejects a discount larger than the amount due', () => {
        expect(() => calculateInvoiceTotals([{ description: 'A', quantity: 1, unitPrice: 1000 }], 20, 1201)).toThrow(
            'Discount must be between 0 and 1200',
        );
    });
});

describe('generateInvoiceNumber()', () => {
    const issuedAt = new Date('2024-03-01T09:05:07.000Z');

    it('formats the UTC timestamp and a four digit suffix', () => {
        expect(generateInvoiceNumber('INV', issuedAt, () => 0.5)).toBe('INV-20240301090507-5000');
    });

    it('pads short suffixes', () => {
        expect(generateInvoiceNumber('INV', issuedAt, () => 0)).toBe('INV-20240301090507-0000');
        expect(generateInvoiceNumber('SUB', issuedAt, () => 0.00075)).toBe('SUB-20240301090507-0007');
    });
});
