import 'reflect-metadata';

export type {
	CheckEventResult,
	Decision,
	DenyReason,
	FollowUpEvent,
	GovernanceStatus,
} from './types';
export { DenyReasons } from './types';
export { ConfigurationError } from './errors';
export {
	ConfigService,
	RoomFreezeConfigSchema,
	type RoomFreezeConfig,
} from './services/config.service';
export { readConfigFromEnv } from './config/env';
export { FreezeStateService } from './services/freeze-state.service';
export { EventAdmissionService } from './services/event-admission.service';
export { AdminSuccessionService } from './services/admin-succession.service';
export { buildFrozenMarker } from './utils/follow-up-events';
export { RoomFreezeSDK } from './sdk';
export { createRoomFreezeContainer, createRoomFreezeSDK } from './container';
export { EventTypes, createRoomStateSnapshot } from '@room-freeze/room';
export type { RoomEvent, RoomStateSnapshot, StateEvent } from '@room-freeze/room';
