import { ValidationError } from '../errors/errors.js';

const OCLC_ORG_PREFIX = '(OCoLC)';
const OCLC_NUMBER_PREFIXES = ['ocm', 'ocn', 'on'] as const;

/**
 * Trimmed digit string, or a `ValidationError` naming the field.
 */
export function validateIdentifier(rawValue: string | undefined, fieldName: string): string {
    const value = (rawValue ?? '').trim();
    if (value === '') {
        throw new ValidationError(`${fieldName} is empty`, fieldName);
    }
    if (!/^\d+$/.test(value)) {
        throw new ValidationError(`Invalid ${fieldName} '${value}': must contain only digits`, fieldName);
    }
    return value;
}

/**
 * Only for strings that already passed `validateIdentifier`.
 */
export function removeLeadingZeros(digits: string): string {
    const stripped = digits.replace(/^0+/, '');
    return stripped === '' ? '0' : stripped;
}

/**
 * OCLC number as sent to the service: catalog prefixes such as `(OCoLC)` and
 * `ocm` dropped, digits validated, leading zeros removed.
 */
export function normalizeOclcNumber(rawValue: string | undefined, fieldName = 'OCLC number'): string {
    let value = (rawValue ?? '').trim();
    if (value.startsWith(OCLC_ORG_PREFIX)) {
        value = value.slice(OCLC_ORG_PREFIX.length).trim();
    }
    const prefix = OCLC_NUMBER_PREFIXES.find((candidate) => value.startsWith(candidate));
    if (prefix !== undefined) {
        value = value.slice(prefix.length);
    }
    return removeLeadingZeros(validateIdentifier(value, fieldName));
}
