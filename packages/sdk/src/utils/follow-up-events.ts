import {
	EventTypes,
	type PduPowerLevelsEventContent,
	type RoomID,
	type UserID,
} from '@room-freeze/room';
import type { FollowUpEvent } from '../types';

// content is bit exact: a single boolean field, nothing else
export function buildFrozenMarker(
	roomId: RoomID,
	sender: UserID,
	frozen: boolean,
): FollowUpEvent {
	return {
		room_id: roomId,
		sender,
		type: EventTypes.Frozen,
		state_key: '',
		content: { frozen },
	};
}

export function buildPowerLevelsEvent(
	roomId: RoomID,
	sender: UserID,
	content: PduPowerLevelsEventContent,
): FollowUpEvent {
	return {
		room_id: roomId,
		sender,
		type: EventTypes.PowerLevels,
		state_key: '',
		content,
	};
}
