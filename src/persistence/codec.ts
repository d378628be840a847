/**
 * IBAN Persistence
 * Byte and JSON encodings of the value object. Restoring re-runs the
 * full validation; anything that would break the invariants is an
 * IBANIntegrityError.
 */

import { IBAN } from '../iban.js';
import { IBANIntegrityError, toFormatError } from '../types/index.js';

/**
 * Version byte written in front of the normalized value
 */
export const SERIALIZATION_VERSION = 1;

/**
 * Encodes an IBAN as [version, ...ASCII bytes of the normalized value]
 */
export function serializeIBAN(iban: IBAN): Uint8Array {
  const body = Buffer.from(iban.toNormalizedString(), 'latin1');
  const bytes = new Uint8Array(body.length + 1);
  bytes[0] = SERIALIZATION_VERSION;
  bytes.set(body, 1);
  return bytes;
}

function restore(value: string, origin: string): IBAN {
  const result = IBAN.tryParse(value);
  if (!result.ok) {
    throw new IBANIntegrityError(`${origin} does not hold a valid IBAN`, {
      cause: toFormatError(result.failure),
    });
  }
  return result.value;
}

/**
 * Restores an IBAN from bytes written by {@link serializeIBAN}
 * @throws IBANIntegrityError if the bytes are truncated, carry an unknown
 * version, or do not hold a valid normalized IBAN
 */
export function deserializeIBAN(bytes: Uint8Array): IBAN {
  if (bytes.length === 0) {
    throw new IBANIntegrityError('Serialized IBAN is empty');
  }

  const version = bytes[0];
  if (version !== SERIALIZATION_VERSION) {
    throw new IBANIntegrityError(`Unsupported serialization version ${String(version)}`);
  }

  const body = Buffer.from(bytes.buffer, bytes.byteOffset + 1, bytes.byteLength - 1);
  return restore(body.toString('latin1'), 'Serialized form');
}

/**
 * Restores an IBAN from the value produced by IBAN#toJSON
 * @throws IBANIntegrityError if the value is not a valid normalized IBAN string
 */
export function reviveIBAN(value: unknown): IBAN {
  if (typeof value !== 'string') {
    throw new IBANIntegrityError(`Expected an IBAN string, got ${typeof value}`);
  }
  return restore(value, 'JSON value');
}
