import { createLogger } from '@room-freeze/core';
import {
	EventTypes,
	FrozenEventContentSchema,
	type RoomEvent,
	type RoomStateSnapshot,
	type StateEvent,
	getStateByMapKey,
} from '@room-freeze/room';
import { injectable } from 'tsyringe';

@injectable()
export class FreezeStateService {
	private readonly logger = createLogger('FreezeStateService');

	getFrozenMarker(snapshot: RoomStateSnapshot): StateEvent | undefined {
		return getStateByMapKey(snapshot, { type: EventTypes.Frozen, state_key: '' });
	}

	// undefined when the content is not a well formed marker
	parseFrozenContent(content: unknown): boolean | undefined {
		const parsed = FrozenEventContentSchema.safeParse(content);

		return parsed.success ? parsed.data.frozen : undefined;
	}

	isFrozenMarker(event: RoomEvent): boolean {
		return event.type === EventTypes.Frozen && event.state_key === '';
	}

	/**
	 * Whether the room is currently frozen. A missing marker means the room
	 * isn't, and so does a malformed one.
	 */
	isFrozen(snapshot: RoomStateSnapshot): boolean {
		const marker = this.getFrozenMarker(snapshot);
		if (!marker) {
			return false;
		}

		const frozen = this.parseFrozenContent(marker.content);
		if (frozen === undefined) {
			this.logger.debug(
				`Ignoring malformed ${EventTypes.Frozen} state in room ${marker.room_id}`,
			);
			return false;
		}

		return frozen;
	}
}
