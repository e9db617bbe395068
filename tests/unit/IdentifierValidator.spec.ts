/**
 * Unit Tests: Identifier validation
 *
 * @see libs/records/validator.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ValidationError } from '../../libs/errors/errors.js';
import { normalizeOclcNumber, removeLeadingZeros, validateIdentifier } from '../../libs/records/validator.js';

describe('Identifier validator', () => {
    it('returns the trimmed digits', () => {
        assert.strictEqual(validateIdentifier(' 990012345 ', 'MMS ID'), '990012345');
    });

    it('rejects an empty value', () => {
        assert.throws(() => validateIdentifier('   ', 'MMS ID'), (err: unknown) => {
            assert.ok(err instanceof ValidationError);
            assert.strictEqual(err.message, 'MMS ID is empty');
            assert.strictEqual(err.field, 'MMS ID');
            return true;
        });
        assert.throws(() => validateIdentifier(undefined, 'MMS ID'), ValidationError);
    });

    it('rejects non-digit characters', () => {
        assert.throws(() => validateIdentifier('12-34', 'OCLC number'), {
            message: "Invalid OCLC number '12-34': must contain only digits"
        });
    });

    it('strips leading zeros but keeps a lone zero', () => {
        assert.strictEqual(removeLeadingZeros('000123'), '123');
        assert.strictEqual(removeLeadingZeros('000'), '0');
    });

    it('drops catalog prefixes from OCLC numbers', () => {
        assert.strictEqual(normalizeOclcNumber('(OCoLC)ocm00012345'), '12345');
        assert.strictEqual(normalizeOclcNumber('ocn123456789'), '123456789');
        assert.strictEqual(normalizeOclcNumber('on1234567890'), '1234567890');
        assert.strictEqual(normalizeOclcNumber(' 0042 '), '42');
    });

    it('rejects an OCLC number with an unknown prefix', () => {
        assert.throws(() => normalizeOclcNumber('(DLC)12345'), ValidationError);
    });
});
