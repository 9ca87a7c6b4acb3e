/**
 * Message ID strategies.
 */

import { randomUUID } from 'node:crypto';
import type { IdGenerator } from '../types/message';

/**
 * Random UUID v4 IDs. Default strategy.
 */
export const uuidIdGenerator: IdGenerator = () => randomUUID();

/**
 * Monotonic IDs of the form `${prefix}${n}`, starting at 1.
 * Deterministic; useful for tests and examples.
 */
export function sequentialIdGenerator(prefix = 'm'): IdGenerator {
	let counter = 0;
	return () => {
		counter++;
		return `${prefix}${counter}`;
	};
}
