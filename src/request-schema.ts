/**
 * Request body validation for the broker router.
 * Each operation has a JSON Schema compiled once with Ajv.
 */

import Ajv, { type ValidateFunction } from 'ajv';
import type {
	OperationName,
	OperationRequests,
	RegisterRequest,
	SendRequest,
	ReadRequest,
	ConfirmRequest,
	PurgeRequest,
	StatsRequest
} from './types/broker';
import { InvalidArgumentError } from './types/errors';

const channelName = { type: 'string', minLength: 1 } as const;

const channelOnlySchema = {
	type: 'object',
	properties: { channel: channelName },
	required: ['channel']
} as const;

const sendSchema = {
	type: 'object',
	properties: {
		channel: channelName,
		data: { type: 'object' }
	},
	required: ['channel', 'data']
} as const;

const confirmSchema = {
	type: 'object',
	properties: {
		channel: channelName,
		message_id: { type: 'string', minLength: 1 }
	},
	required: ['channel', 'message_id']
} as const;

const statsSchema = {
	type: 'object',
	properties: {
		channel: { type: ['string', 'null'], minLength: 1 }
	}
} as const;

type RequestValidators = { [K in OperationName]: ValidateFunction<OperationRequests[K]> };

const ajv = new Ajv({ allErrors: true, strict: false });

const validators: RequestValidators = {
	register: ajv.compile<RegisterRequest>(channelOnlySchema),
	send: ajv.compile<SendRequest>(sendSchema),
	read: ajv.compile<ReadRequest>(channelOnlySchema),
	confirm: ajv.compile<ConfirmRequest>(confirmSchema),
	purge: ajv.compile<PurgeRequest>(channelOnlySchema),
	stats: ajv.compile<StatsRequest>(statsSchema)
};

/**
 * Validate a request body for an operation.
 * @returns The body, typed for the operation
 * @throws {InvalidArgumentError} Code 3 - Body does not match the operation's schema
 */
export function validateRequest<K extends OperationName>(operation: K, body: unknown): OperationRequests[K] {
	const validate: ValidateFunction<OperationRequests[K]> = validators[operation];

	if (!validate(body)) {
		const errors = validate.errors?.map(e => `${e.instancePath || '/'} ${e.message}`).join(', ') || 'Validation failed';
		throw new InvalidArgumentError(`Invalid request: ${errors}`, validate.errors);
	}
	return body;
}
