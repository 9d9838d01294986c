import type {
	RoomStateSnapshot,
	StateEvent,
	StateKey,
	StateMapKey,
} from '../types/_common';

export function getStateMapKey(event: {
	type: string;
	state_key?: StateKey;
}): StateMapKey {
	return `${event.type}:${event.state_key ?? ''}` as const;
}

export function getStateByMapKey(
	map: RoomStateSnapshot,
	event: { type: string; state_key?: StateKey },
): StateEvent | undefined {
	return map.get(getStateMapKey(event));
}

// later events win, the host hands them over in state resolution order
export function createRoomStateSnapshot(
	events: Iterable<StateEvent>,
): RoomStateSnapshot {
	const state = new Map<StateMapKey, StateEvent>();
	for (const event of events) {
		state.set(getStateMapKey(event), event);
	}

	return state;
}
