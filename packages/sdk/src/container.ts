import 'reflect-metadata';

import { type DependencyContainer, container } from 'tsyringe';

import { RoomFreezeSDK } from './sdk';
import { AdminSuccessionService } from './services/admin-succession.service';
import { ConfigService } from './services/config.service';
import { EventAdmissionService } from './services/event-admission.service';
import { FreezeStateService } from './services/freeze-state.service';

/**
 * Validates `config` and registers every service in a child of the global
 * container, so several differently configured instances can live side by side.
 * Throws a `ConfigurationError` when the configuration is invalid.
 */
export function createRoomFreezeContainer(
	config: unknown,
	parent: DependencyContainer = container,
): DependencyContainer {
	const configService = new ConfigService();
	configService.setConfig(config);

	const child = parent.createChildContainer();

	child.register<ConfigService>(ConfigService, {
		useValue: configService,
	});

	child.registerSingleton(FreezeStateService);
	child.registerSingleton(EventAdmissionService);
	child.registerSingleton(AdminSuccessionService);
	child.registerSingleton(RoomFreezeSDK);

	return child;
}

export function createRoomFreezeSDK(config: unknown): RoomFreezeSDK {
	return createRoomFreezeContainer(config).resolve(RoomFreezeSDK);
}
