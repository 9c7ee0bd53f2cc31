import { describe, it, expect } from 'vitest';
import { recognizePayableTo } from '../../../src/extractor/fields/payable-to.js';

describe('recognizePayableTo', () => {
    it('reads a Make Check Payable To label', () => {
        expect(recognizePayableTo('Make Check Payable To: PTA Treasurer\n')).toEqual({
            value: 'PTA Treasurer',
            rule: 'make-check-payable-to-label',
        });
    });

    it('reads a Payable To label', () => {
        expect(recognizePayableTo("Payable to: Dana O'Brien-Smith")).toEqual({
            value: "Dana O'Brien-Smith",
            rule: 'payable-to-label',
        });
    });

    it('reads a Pay To label', () => {
        expect(recognizePayableTo('Pay To: Sam Lee')).toEqual({ value: 'Sam Lee', rule: 'pay-to-label' });
    });

    it('returns empty without a label', () => {
        expect(recognizePayableTo('Jane Kim')).toEqual({ value: '', rule: null });
    });
});
