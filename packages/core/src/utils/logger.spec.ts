import logger, { createLogger, resolveLogLevel } from './logger';

describe('createLogger', () => {
	it('should bind the service name on a child of the root logger', () => {
		const child = createLogger('FreezeStateService');

		expect(child.bindings().name).toBe('FreezeStateService');
		expect(child.level).toBe(logger.level);
	});
});

describe('resolveLogLevel', () => {
	it('should keep known pino levels', () => {
		expect(resolveLogLevel('debug')).toBe('debug');
		expect(resolveLogLevel('silent')).toBe('silent');
	});

	it('should fall back to info', () => {
		expect(resolveLogLevel(undefined)).toBe('info');
		expect(resolveLogLevel('loud')).toBe('info');
	});
});
