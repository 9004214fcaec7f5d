import type { ValueKind } from '../types';

const HEX_PATTERN = /^[0-9a-fA-F]*$/;
const DECIMAL_PATTERN = /^[0-9]+$/;

/**
 * Check an option default literal against its value kind's grammar.
 * Magnitudes are not range-checked; U32/I32 wraparound belongs to the consumer.
 */
export function isValidDefault(valueKind: ValueKind, literal: string | null | undefined): boolean {
  if (typeof literal !== 'string') {
    return false;
  }

  switch (valueKind) {
    case 'STR':
    case 'PATH':
    case 'BYTES':
      return true;
    case 'BYTES_HEX':
      return literal.length % 2 === 0 && HEX_PATTERN.test(literal);
    case 'U32':
      return DECIMAL_PATTERN.test(literal);
    case 'I32':
      return DECIMAL_PATTERN.test(literal.startsWith('-') ? literal.slice(1) : literal);
  }
}
