/**
 * Parameter List Ingestion
 */

import { InvalidInputError, errorMessage } from '../errors';
import { validateParameterList } from '../schemas';
import type { ParameterRequest } from '../types';

/**
 * Accept a parameter list as a JSON string or an already decoded value.
 *
 * @throws InvalidInputError listing every schema violation
 */
export function parseParameterList(input: unknown): ParameterRequest[] {
  let decoded = input;
  if (typeof input === 'string') {
    try {
      decoded = JSON.parse(input);
    } catch (error) {
      throw new InvalidInputError('parameter list is not valid JSON', [errorMessage(error)], error);
    }
  }

  const validation = validateParameterList(decoded);
  if (!validation.valid) {
    throw new InvalidInputError('parameter list does not match the expected shape', validation.errors);
  }

  return validation.value.map(({ id, name, description }) => ({ id, name, description }));
}
