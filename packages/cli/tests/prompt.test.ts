import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { createConsoleIO, selectFromList, INPUT_CLOSED } from '../src/utils/prompt.js';
import { scriptedIO } from './helpers/fixtures.js';

describe('createConsoleIO', () => {
    it('should answer from the input stream', async () => {
        const input = new PassThrough();
        const io = createConsoleIO(input, new PassThrough());

        const answer = io.ask('> ');
        input.write('Ann Lee\n');

        await expect(answer).resolves.toBe('Ann Lee');
        io.close();
    });

    it('should reject a pending question when input ends', async () => {
        const input = new PassThrough();
        const io = createConsoleIO(input, new PassThrough());

        const answer = io.ask('> ');
        input.end();

        await expect(answer).rejects.toThrow(INPUT_CLOSED);
        await expect(io.ask('> ')).rejects.toThrow(INPUT_CLOSED);
    });
});

describe('selectFromList', () => {
    it('should pick an option by number', async () => {
        const io = scriptedIO(['2']);
        expect(await selectFromList(['Check', 'Debit'], 'Payment type', io)).toBe('Debit');
        expect(io.output).toEqual([
            '\nPayment type:',
            '  1. Check',
            '  2. Debit',
            '  3. Other (enter custom value)',
            '\n> ',
        ]);
    });

    it('should ask again after an out-of-range number', async () => {
        const io = scriptedIO(['9', '1']);
        expect(await selectFromList(['Check', 'Debit'], 'Payment type', io)).toBe('Check');
        expect(io.output).toContain('Please enter a number between 1 and 3');
    });

    it('should confirm typed text as a custom value', async () => {
        const io = scriptedIO(['Venmo', 'y']);
        expect(await selectFromList(['Check'], 'Payment type', io)).toBe('Venmo');
        expect(io.output).toContain("Use 'Venmo' as custom value? (y/n): ");
    });

    it('should take free text when there are no options', async () => {
        const io = scriptedIO(['  Snacks ']);
        expect(await selectFromList([], 'Budget item', io)).toBe('Snacks');
        expect(io.output).toEqual(['\nBudget item: ']);
    });
});
