import {
	EventTypes,
	type RoomEvent,
	type RoomStateSnapshot,
	type StateEvent,
	createRoomStateSnapshot,
} from '@room-freeze/room';

export const ROOM_ID = '!someroom:example.com';

export const DEFAULT_POWER_LEVELS = {
	ban: 50,
	events: {
		'm.room.avatar': 50,
		'm.room.canonical_alias': 50,
		'm.room.encryption': 100,
		'm.room.history_visibility': 100,
		'm.room.name': 50,
		'm.room.power_levels': 100,
		'm.room.server_acl': 100,
		'm.room.tombstone': 100,
	},
	events_default: 0,
	invite: 0,
	kick: 50,
	redact: 50,
	state_default: 50,
	users_default: 0,
};

export class RoomStateBuilder {
	private readonly events: StateEvent[] = [];

	constructor(
		private readonly roomId = ROOM_ID,
		private readonly creator = '@alice:example.com',
	) {
		this.withState(EventTypes.Create, '', { creator, room_version: '10' });
	}

	withState(
		type: string,
		stateKey: string,
		content: Record<string, unknown>,
		sender = this.creator,
	) {
		this.events.push({
			type,
			state_key: stateKey,
			sender,
			room_id: this.roomId,
			content,
		});
		return this;
	}

	withPowerLevels(
		users: Record<string, number | string>,
		overrides: Record<string, unknown> = {},
	) {
		return this.withState(EventTypes.PowerLevels, '', {
			...DEFAULT_POWER_LEVELS,
			...overrides,
			users,
		});
	}

	withMember(userId: string, membership: string) {
		return this.withState(EventTypes.Member, userId, { membership }, userId);
	}

	withFrozen(content: Record<string, unknown>) {
		return this.withState(EventTypes.Frozen, '', content);
	}

	build(): RoomStateSnapshot {
		return createRoomStateSnapshot(this.events);
	}
}

export function frozenEvent(
	sender: string,
	content: Record<string, unknown>,
	roomId = ROOM_ID,
): RoomEvent {
	return {
		type: EventTypes.Frozen,
		state_key: '',
		sender,
		room_id: roomId,
		content,
	};
}

export function membershipEvent(
	sender: string,
	target: string,
	membership: string,
	roomId = ROOM_ID,
): RoomEvent {
	return {
		type: EventTypes.Member,
		state_key: target,
		sender,
		room_id: roomId,
		content: { membership },
	};
}

export function messageEvent(sender: string, roomId = ROOM_ID): RoomEvent {
	return {
		type: EventTypes.Message,
		sender,
		room_id: roomId,
		content: { msgtype: 'm.text', body: 'hello world' },
	};
}

export function powerLevelsEvent(
	sender: string,
	content: Record<string, unknown>,
	roomId = ROOM_ID,
): RoomEvent {
	return {
		type: EventTypes.PowerLevels,
		state_key: '',
		sender,
		room_id: roomId,
		content,
	};
}
