// Kept in its own module so tests can swap the generator.
import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a random identifier of 32 lowercase hex characters (eight groups of four, without
 * separators). Callers should treat the value as opaque.
 */
export function generateId(): string {
  return uuidv4().replace(/-/g, '');
}
