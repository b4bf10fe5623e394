import { validate } from 'class-validator';
import { ValidationError } from '../../shared/errors';

/** Runs class-validator on `dto` and throws a ValidationError listing every violated constraint. */
export async function assertValid<T extends object>(dto: T): Promise<T> {
  const errors = await validate(dto);
  if (errors.length > 0) {
    const message = errors.map((e) => Object.values(e.constraints ?? {}).join(', ')).join('; ');
    throw new ValidationError(message, errors[0].property);
  }
  return dto;
}
