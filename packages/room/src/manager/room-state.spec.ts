import { createRoomStateSnapshot } from '../state/definitions';
import type { StateEvent } from '../types/_common';
import { RoomState } from './room-state';

const roomId = '!room:example.com';
const creator = '@creator:example.com';

function stateEvent(
	type: string,
	stateKey: string,
	content: Record<string, unknown>,
	sender = creator,
): StateEvent {
	return { type, state_key: stateKey, sender, room_id: roomId, content };
}

function member(userId: string, membership: unknown) {
	return stateEvent('m.room.member', userId, { membership }, userId);
}

describe('RoomState', () => {
	const createEvent = stateEvent('m.room.create', '', {
		creator,
		room_version: '10',
	});

	it('should read the creator from the create event', () => {
		const state = new RoomState(createRoomStateSnapshot([createEvent]));

		expect(state.creator).toBe(creator);
	});

	it('should fall back to the create event sender for room version 11', () => {
		const state = new RoomState(
			createRoomStateSnapshot([
				stateEvent('m.room.create', '', { room_version: '11' }, '@v11:example.com'),
			]),
		);

		expect(state.creator).toBe('@v11:example.com');
	});

	it('should give the creator admin power without a power levels event', () => {
		const state = new RoomState(
			createRoomStateSnapshot([createEvent, member(creator, 'join')]),
		);

		expect(state.getPowerLevelForUser(creator)).toBe(100);
		expect(state.getPowerLevelForUser('@other:example.com')).toBe(0);
	});

	it('should list members with their membership and power level', () => {
		const state = new RoomState(
			createRoomStateSnapshot([
				createEvent,
				stateEvent('m.room.power_levels', '', {
					users: { [creator]: 100, '@mod:example.com': 50 },
				}),
				member(creator, 'join'),
				member('@mod:example.com', 'join'),
				member('@gone:example.com', 'leave'),
				member('@broken:example.com', 'dancing'),
			]),
		);

		expect(state.getMembers()).toEqual([
			{ userId: creator, membership: 'join', powerLevel: 100 },
			{ userId: '@mod:example.com', membership: 'join', powerLevel: 50 },
			{ userId: '@gone:example.com', membership: 'leave', powerLevel: 0 },
		]);
		expect(state.getJoinedMembers().map(({ userId }) => userId)).toEqual([
			creator,
			'@mod:example.com',
		]);
		expect(state.getUserMembership('@broken:example.com')).toBeUndefined();
		expect(state.getUserMembership('@stranger:example.com')).toBeUndefined();
	});
});
