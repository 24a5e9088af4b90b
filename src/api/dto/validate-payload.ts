import { plainToInstance, type ClassConstructor } from 'class-transformer';
import { validateSync } from 'class-validator';
import { ValidationError } from '../../common/errors/crawl-prime.errors';

/**
 * Applies a request DTO's class-validator rules to a message payload, the
 * way the global ValidationPipe does for HTTP bodies.
 */
export function validatePayload<T extends object>(
  dto: ClassConstructor<T>,
  payload: object | undefined,
): T {
  const instance = plainToInstance(dto, payload ?? {});
  const errors = validateSync(instance, { whitelist: true });

  if (errors.length > 0) {
    throw new ValidationError(
      errors
        .map((error) => Object.values(error.constraints ?? {}).join(', '))
        .join('; '),
    );
  }
  return instance;
}
