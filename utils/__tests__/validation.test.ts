import { describe, expect, it } from 'vitest';
import { validateParameters } from '../validation';

describe('validateParameters', () => {
    it('rejects empty parameters', () => {
        expect(validateParameters({})).toEqual({ valid: false, message: 'No query parameters provided' });
    });

    it('requires a name', () => {
        expect(validateParameters({ age: '30' })).toEqual({ valid: false, message: 'Name parameter is required' });
        expect(validateParameters({ name: ' \t ' })).toEqual({ valid: false, message: 'Name parameter is required' });
    });

    it('accepts a name alone', () => {
        expect(validateParameters({ name: 'Grace' })).toEqual({ valid: true, name: 'Grace', age: null, parsedAge: null });
    });

    it('parses integer ages with surrounding whitespace and a sign', () => {
        expect(validateParameters({ name: 'Grace', age: ' 42 ' })).toEqual({
            valid: true,
            name: 'Grace',
            age: ' 42 ',
            parsedAge: 42,
        });
        expect(validateParameters({ name: 'Grace', age: '+7' })).toEqual({
            valid: true,
            name: 'Grace',
            age: '+7',
            parsedAge: 7,
        });
    });

    it('treats an empty age as absent for range checks', () => {
        expect(validateParameters({ name: 'Grace', age: '' })).toEqual({ valid: true, name: 'Grace', age: '', parsedAge: null });
    });

    it('accepts the bounds of the age range', () => {
        expect(validateParameters({ name: 'Grace', age: '0' })).toMatchObject({ valid: true, parsedAge: 0 });
        expect(validateParameters({ name: 'Grace', age: '150' })).toMatchObject({ valid: true, parsedAge: 150 });
    });

    it.each(['-1', '151', '1000'])('rejects age %s as out of range', (age) => {
        expect(validateParameters({ name: 'Grace', age })).toEqual({ valid: false, message: 'Age must be between 0 and 150' });
    });

    it.each(['abc', '12.5', '1e2', '4 2'])('rejects age %s as not a number', (age) => {
        expect(validateParameters({ name: 'Grace', age })).toEqual({ valid: false, message: 'Age must be a valid number' });
    });
});
