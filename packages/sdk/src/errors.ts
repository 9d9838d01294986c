/**
 * Raised while loading the module configuration. Never raised at request time:
 * a host that gets this should refuse to start rather than run without the gate.
 */
export class ConfigurationError extends Error {
	name = 'ConfigurationError';
}
