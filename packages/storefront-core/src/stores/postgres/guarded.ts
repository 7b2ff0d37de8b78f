import { z } from 'zod';
import { StorageError, StorefrontError } from '../../errors';

const uuid = z.string().uuid();

/**
 * Row ids are UUID columns; anything else cannot match a row and would make
 * Postgres raise 22P02, so stores answer "not found" without querying.
 */
export function isUuid(id: string): boolean {
  return uuid.safeParse(id).success;
}

/**
 * Run a store operation, turning driver failures into StorageError. Domain
 * errors raised inside the operation pass through untouched.
 */
export async function guarded<T>(operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof StorefrontError) throw error;
    throw new StorageError(operation, error);
  }
}
