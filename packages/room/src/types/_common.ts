export type StateKey = string;

export type EventID = string;

export type RoomID = string;

export type UserID = string;

export type StateMapKey = `${string}:${StateKey}`;

// the subset of a pdu the gate reads; hashes, signatures and the dag fields stay with the host
export interface RoomEvent {
	event_id?: EventID;
	type: string;
	state_key?: StateKey;
	sender: UserID;
	room_id: RoomID;
	content: Record<string, unknown>;
}

export interface StateEvent extends RoomEvent {
	state_key: StateKey;
}

export type RoomStateSnapshot = ReadonlyMap<StateMapKey, StateEvent>;
