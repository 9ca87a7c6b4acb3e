/**
 * Environment-driven broker configuration.
 *
 * BROKER_AUTO_CREATE_CHANNELS  true | false | 1 | 0
 * BROKER_MISSING_CHANNEL       error | empty
 */

import type { BrokerOptions, MissingChannelPolicy } from './types/broker';
import { InvalidArgumentError } from './types/errors';

type Env = Record<string, string | undefined>;

function parseBoolean(name: string, value: string): boolean {
	switch (value.trim().toLowerCase()) {
		case 'true':
		case '1':
			return true;
		case 'false':
		case '0':
			return false;
		default:
			throw new InvalidArgumentError(`${name} must be true or false, got: ${value}`);
	}
}

function parseMissingChannel(value: string): MissingChannelPolicy {
	const policy = value.trim().toLowerCase();
	if (policy === 'error' || policy === 'empty') {
		return policy;
	}
	throw new InvalidArgumentError(`BROKER_MISSING_CHANNEL must be error or empty, got: ${value}`);
}

/**
 * Read broker options from environment variables. Unset variables are left out,
 * so registry defaults apply.
 * @throws {InvalidArgumentError} Code 3 - A variable holds an unrecognised value
 */
export function loadBrokerOptionsFromEnv(env: Env = process.env): BrokerOptions {
	const options: BrokerOptions = {};

	const autoCreate = env.BROKER_AUTO_CREATE_CHANNELS;
	if (autoCreate !== undefined && autoCreate !== '') {
		options.autoCreateChannels = parseBoolean('BROKER_AUTO_CREATE_CHANNELS', autoCreate);
	}

	const missingChannel = env.BROKER_MISSING_CHANNEL;
	if (missingChannel !== undefined && missingChannel !== '') {
		options.missingChannel = parseMissingChannel(missingChannel);
	}

	return options;
}
