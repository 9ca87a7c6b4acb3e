/**
 * Payload validation and copying.
 */

import type { JsonValue, Payload } from '../types/message';
import { InvalidArgumentError } from '../types/errors';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== 'object' || value === null || Array.isArray(value)) {
		return false;
	}
	const proto = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

function copyJsonValue(value: unknown, path: string): JsonValue {
	if (value === null || typeof value === 'string' || typeof value === 'boolean') {
		return value;
	}
	if (typeof value === 'number') {
		if (!Number.isFinite(value)) {
			throw new InvalidArgumentError(`Payload value at ${path} is not a finite number`);
		}
		return value;
	}
	if (Array.isArray(value)) {
		return value.map((item, index) => copyJsonValue(item, `${path}[${index}]`));
	}
	if (isPlainObject(value)) {
		return copyObject(value, path);
	}
	throw new InvalidArgumentError(`Payload value at ${path} is not JSON-representable`);
}

// fromEntries defines own properties, so a "__proto__" key stays a plain key.
function copyObject(value: Record<string, unknown>, path: string): Payload {
	return Object.fromEntries(
		Object.entries(value).map(([key, item]): [string, JsonValue] => [key, copyJsonValue(item, `${path}.${key}`)])
	);
}

/**
 * Validate that `value` is a JSON object and return a deep copy of it.
 * @throws {InvalidArgumentError} Code 3 - Not a plain object, or holds a non-JSON value
 */
export function toPayload(value: unknown): Payload {
	if (!isPlainObject(value)) {
		throw new InvalidArgumentError('Payload must be a JSON object');
	}
	return copyObject(value, '$');
}
