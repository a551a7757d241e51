import {
  REFERENCE_NUMBER_PREFIX,
  generateReferenceNumber,
} from './reference-number.util';

describe('reference numbers', () => {
  it('should generate OPN- followed by eight upper-case hex characters', () => {
    const reference = generateReferenceNumber();

    expect(reference.startsWith(REFERENCE_NUMBER_PREFIX)).toBe(true);
    expect(reference).toMatch(/^OPN-[0-9A-F]{8}$/);
  });
});
